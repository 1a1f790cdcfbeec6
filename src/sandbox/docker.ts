import Dockerode from 'dockerode';
import type { ContainerApi, DockerEngine } from './engine.js';
import { platform } from 'os';
import { PassThrough, Readable } from 'stream';
import type { CleanupOutcome, ContainerRuntime, StartOptions } from './types.js';
import type { ContainerHandle, ContainerStatusType } from '../types/shared.js';
import { CONTAINER_PATHS } from '../types/shared.js';
import { errorMessage, fail, fromUnknown, ok, type Result } from '../errors.js';
import { CLEANUP_RETRY, withRetry, type RetryOptions } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('docker');

const PROXY_VARS = ['HTTP_PROXY', 'HTTPS_PROXY', 'NO_PROXY'] as const;

interface HandleRecord {
  id: string;
  status: ContainerStatusType;
  startedAt: string;
}

export function dockerStatusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

// 304: already stopped, 404: no such container, 409: not running
function isGone(err: unknown): boolean {
  const code = dockerStatusCode(err);
  return code === 304 || code === 404 || code === 409;
}

export function mapDockerState(state: string): ContainerStatusType {
  switch (state) {
    case 'created': return 'created';
    case 'running':
    case 'paused':
    case 'restarting': return 'running';
    default: return 'exited';
  }
}

export class DockerRuntime implements ContainerRuntime {
  private docker: DockerEngine;
  private retry: RetryOptions;
  private records = new Map<string, HandleRecord>();

  constructor(docker?: DockerEngine, retry: RetryOptions = CLEANUP_RETRY) {
    this.docker = docker ?? new Dockerode();
    this.retry = retry;
  }

  buildContainerOptions(opts: StartOptions): Dockerode.ContainerCreateOptions {
    const env: string[] = [];
    for (const name of PROXY_VARS) {
      const value = process.env[name];
      if (value) env.push(`${name}=${value}`);
    }
    env.push(`FORGE_WORKSPACE=${CONTAINER_PATHS.WORKSPACE}`);
    env.push(`FORGE_OUTPUT=${CONTAINER_PATHS.OUTPUT}`);
    for (const [key, value] of Object.entries(opts.env)) {
      env.push(`${key}=${value}`);
    }

    const createOpts: Dockerode.ContainerCreateOptions = {
      name: `forge-${opts.workspace.name}`,
      Image: opts.image,
      Cmd: opts.command,
      Env: env,
      WorkingDir: CONTAINER_PATHS.OUTPUT,
      Tty: false,
      Labels: { 'idea-forge.workspace': opts.workspace.name },
      HostConfig: {
        Binds: [`${opts.workspace.root}:${CONTAINER_PATHS.WORKSPACE}:rw`],
        NetworkMode: 'bridge',
      },
    };

    // Generated files should belong to the invoking user
    if (platform() === 'linux') {
      createOpts.User = `${process.getuid?.() ?? 1000}:${process.getgid?.() ?? 1000}`;
    }

    return createOpts;
  }

  async ping(): Promise<boolean> {
    try {
      await this.docker.ping();
      return true;
    } catch (err) {
      log.debug('Docker ping failed', err);
      return false;
    }
  }

  async start(opts: StartOptions): Promise<Result<ContainerHandle>> {
    let container: ContainerApi;
    try {
      container = await this.docker.createContainer(this.buildContainerOptions(opts));
    } catch (err) {
      log.error(`Failed to create container from ${opts.image}`, err);
      return fail(fromUnknown('RuntimeStartError', err, 'Container creation failed'));
    }

    const record: HandleRecord = { id: container.id, status: 'created', startedAt: new Date().toISOString() };
    this.records.set(record.id, record);

    try {
      await container.start();
    } catch (err) {
      log.error(`Failed to start container ${shortId(record.id)}`, err);
      await this.remove(record);
      return fail(fromUnknown('RuntimeStartError', err, 'Container startup failed'));
    }

    record.status = 'running';
    log.info(`Container ${shortId(record.id)} started from ${opts.image}`);
    return ok(record);
  }

  async stop(handle: ContainerHandle, graceSeconds: number): Promise<CleanupOutcome> {
    const container = this.docker.getContainer(handle.id);
    const outcome = await this.attempt(`stop ${shortId(handle.id)}`, async () => {
      try {
        await container.stop({ t: graceSeconds });
      } catch (err) {
        if (isGone(err)) return;
        log.warn(`Graceful stop failed for ${shortId(handle.id)}, killing`, err);
        try {
          await container.kill();
        } catch (killErr) {
          if (!isGone(killErr)) throw killErr;
        }
      }
    });
    if (outcome.ok) this.mark(handle.id, 'exited');
    return outcome;
  }

  async remove(handle: ContainerHandle): Promise<CleanupOutcome> {
    const container = this.docker.getContainer(handle.id);
    const outcome = await this.attempt(`remove ${shortId(handle.id)}`, async () => {
      try {
        await container.remove({ force: true });
      } catch (err) {
        if (dockerStatusCode(err) !== 404) throw err;
      }
    });
    if (outcome.ok) {
      this.mark(handle.id, 'removed');
      log.info(`Container ${shortId(handle.id)} removed`);
    }
    return outcome;
  }

  async status(handle: ContainerHandle): Promise<ContainerStatusType> {
    try {
      const info = await this.docker.getContainer(handle.id).inspect();
      const status = mapDockerState(info.State.Status);
      this.mark(handle.id, status);
      return status;
    } catch (err) {
      if (dockerStatusCode(err) === 404) {
        this.mark(handle.id, 'removed');
        return 'removed';
      }
      log.warn(`Failed to inspect container ${shortId(handle.id)}`, err);
      return this.records.get(handle.id)?.status ?? handle.status;
    }
  }

  async logs(handle: ContainerHandle, signal: AbortSignal): Promise<AsyncIterable<string | Buffer>> {
    const raw = await this.docker.getContainer(handle.id).logs({
      follow: true, stdout: true, stderr: true,
    });
    const out = new PassThrough();
    this.docker.modem.demuxStream(raw, out, out);
    raw.on('end', () => out.end());
    raw.on('error', (err: Error) => out.destroy(err));

    const onAbort = () => {
      out.end();
      if (raw instanceof Readable) raw.destroy();
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    return out;
  }

  async wait(handle: ContainerHandle): Promise<{ exitCode: number }> {
    const result = await this.docker.getContainer(handle.id).wait();
    this.mark(handle.id, 'exited');
    return { exitCode: result.StatusCode };
  }

  private mark(id: string, status: ContainerStatusType): void {
    const record = this.records.get(id);
    if (record && record.status !== 'removed') record.status = status;
  }

  private async attempt(label: string, fn: () => Promise<void>): Promise<CleanupOutcome> {
    let attempts = 0;
    try {
      await withRetry(async () => {
        attempts++;
        await fn();
      }, this.retry, (n, err, delayMs) => {
        log.debug(`${label} attempt ${n} failed (${err.message}), retrying in ${delayMs}ms`);
      });
      return { ok: true, attempts };
    } catch (err) {
      log.warn(`Failed to ${label} after ${attempts} attempt(s)`, err);
      return { ok: false, attempts, error: errorMessage(err) };
    }
  }
}

export function shortId(id: string): string {
  return id.slice(0, 12);
}
