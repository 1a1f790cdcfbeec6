import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { platform } from 'os';
import { DockerRuntime, mapDockerState, shortId } from '../src/sandbox/docker.js';
import type { StartOptions } from '../src/sandbox/types.js';
import type { ContainerHandle } from '../src/types/shared.js';
import type { RetryOptions } from '../src/utils/retry.js';
import { setLogSink } from '../src/utils/logger.js';
import { StubEngine, statusError } from './helpers/docker-stub.js';

const FAST_RETRY: RetryOptions = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

const startOptions: StartOptions = {
  image: 'idea-forge:latest',
  workspace: {
    name: '20260118_142501_todo_a1b2',
    root: '/home/user/forge_output/20260118_142501_todo_a1b2',
    configDir: '/home/user/forge_output/20260118_142501_todo_a1b2/config',
    outputDir: '/home/user/forge_output/20260118_142501_todo_a1b2/output',
    createdAt: '2026-01-18T14:25:01.000Z',
  },
  command: ['sh', '/workspace/config/startup.sh'],
  env: { MODEL: 'opus', ANTHROPIC_API_KEY: 'test-secret' },
};

const handle: ContainerHandle = { id: 'c0ffee1234567890abcdef', status: 'running', startedAt: '2026-01-18T14:25:01.000Z' };

beforeEach(() => {
  setLogSink(() => {});
});

afterEach(() => {
  setLogSink((line) => console.error(line));
});

describe('DockerRuntime.buildContainerOptions', () => {
  it('mounts the workspace read-write and runs in the output directory', () => {
    const opts = new DockerRuntime(new StubEngine()).buildContainerOptions(startOptions);
    expect(opts.name).toBe('forge-20260118_142501_todo_a1b2');
    expect(opts.Image).toBe('idea-forge:latest');
    expect(opts.Cmd).toEqual(['sh', '/workspace/config/startup.sh']);
    expect(opts.WorkingDir).toBe('/workspace/output');
    expect(opts.HostConfig?.Binds).toEqual(['/home/user/forge_output/20260118_142501_todo_a1b2:/workspace:rw']);
    expect(opts.Labels).toEqual({ 'idea-forge.workspace': '20260118_142501_todo_a1b2' });
  });

  it('passes workspace paths and caller env into the container', () => {
    const opts = new DockerRuntime(new StubEngine()).buildContainerOptions(startOptions);
    expect(opts.Env).toContain('FORGE_WORKSPACE=/workspace');
    expect(opts.Env).toContain('FORGE_OUTPUT=/workspace/output');
    expect(opts.Env).toContain('MODEL=opus');
    expect(opts.Env).toContain('ANTHROPIC_API_KEY=test-secret');
  });

  it('passes proxy env vars to the container', () => {
    process.env.HTTP_PROXY = 'http://proxy:8080';
    const opts = new DockerRuntime(new StubEngine()).buildContainerOptions(startOptions);
    delete process.env.HTTP_PROXY;
    expect(opts.Env).toContain('HTTP_PROXY=http://proxy:8080');
  });

  it('runs as the invoking user on linux', () => {
    const opts = new DockerRuntime(new StubEngine()).buildContainerOptions(startOptions);
    if (platform() === 'linux') expect(opts.User).toMatch(/^\d+:\d+$/);
    else expect(opts.User).toBeUndefined();
  });
});

describe('DockerRuntime.start', () => {
  it('creates and starts the container', async () => {
    const engine = new StubEngine();
    const result = await new DockerRuntime(engine, FAST_RETRY).start(startOptions);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.id).toBe('c0ffee1234567890abcdef');
      expect(result.value.status).toBe('running');
    }
    expect(engine.created).toHaveLength(1);
    expect(engine.container.calls).toEqual(['start']);
  });

  it('reports a creation failure', async () => {
    const engine = new StubEngine();
    engine.createError = statusError(404, 'No such image: idea-forge:latest');

    const result = await new DockerRuntime(engine, FAST_RETRY).start(startOptions);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.category).toBe('RuntimeStartError');
      expect(result.error.message).toBe('Container creation failed: No such image: idea-forge:latest');
    }
  });

  it('removes a container that fails to start', async () => {
    const engine = new StubEngine();
    engine.container.startError = new Error('port is already allocated');

    const result = await new DockerRuntime(engine, FAST_RETRY).start(startOptions);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Container startup failed: port is already allocated');
    expect(engine.container.calls).toEqual(['start', 'remove:true']);
  });
});

describe('DockerRuntime cleanup', () => {
  it('stops gracefully with the given grace period', async () => {
    const engine = new StubEngine();
    const outcome = await new DockerRuntime(engine, FAST_RETRY).stop(handle, 10);
    expect(outcome).toEqual({ ok: true, attempts: 1 });
    expect(engine.container.calls).toEqual(['stop:10']);
  });

  it('treats an already stopped container as stopped', async () => {
    const engine = new StubEngine();
    engine.container.stopErrors = [statusError(304, 'container already stopped')];
    const outcome = await new DockerRuntime(engine, FAST_RETRY).stop(handle, 10);
    expect(outcome.ok).toBe(true);
    expect(engine.container.calls).toEqual(['stop:10']);
  });

  it('kills the container when a graceful stop fails', async () => {
    const engine = new StubEngine();
    engine.container.stopErrors = [statusError(500, 'daemon busy')];
    const outcome = await new DockerRuntime(engine, FAST_RETRY).stop(handle, 10);
    expect(outcome).toEqual({ ok: true, attempts: 1 });
    expect(engine.container.calls).toEqual(['stop:10', 'kill']);
  });

  it('gives up after the retry budget without throwing', async () => {
    const engine = new StubEngine();
    const busy = () => statusError(500, 'daemon busy');
    engine.container.stopErrors = [busy(), busy(), busy()];
    engine.container.killErrors = [busy(), busy(), busy()];

    const outcome = await new DockerRuntime(engine, FAST_RETRY).stop(handle, 10);

    expect(outcome).toEqual({ ok: false, attempts: 3, error: 'daemon busy' });
    expect(engine.container.calls.filter(c => c === 'kill')).toHaveLength(3);
  });

  it('removes with force and retries transient failures', async () => {
    const engine = new StubEngine();
    engine.container.removeErrors = [statusError(500, 'removal in progress')];
    const outcome = await new DockerRuntime(engine, FAST_RETRY).remove(handle);
    expect(outcome).toEqual({ ok: true, attempts: 2 });
    expect(engine.container.calls).toEqual(['remove:true', 'remove:true']);
  });

  it('treats a missing container as removed', async () => {
    const engine = new StubEngine();
    engine.container.removeErrors = [statusError(404, 'no such container')];
    const outcome = await new DockerRuntime(engine, FAST_RETRY).remove(handle);
    expect(outcome).toEqual({ ok: true, attempts: 1 });
  });
});

describe('DockerRuntime.status', () => {
  it('maps the daemon state', async () => {
    const engine = new StubEngine();
    engine.container.state = 'exited';
    expect(await new DockerRuntime(engine).status(handle)).toBe('exited');
  });

  it('reports a missing container as removed', async () => {
    const engine = new StubEngine();
    engine.container.inspectError = statusError(404, 'no such container');
    expect(await new DockerRuntime(engine).status(handle)).toBe('removed');
  });

  it('falls back to the last known status on other errors', async () => {
    const engine = new StubEngine();
    engine.container.inspectError = new Error('connect ECONNREFUSED');
    expect(await new DockerRuntime(engine).status(handle)).toBe('running');
  });
});

describe('DockerRuntime.logs', () => {
  it('streams demultiplexed output until the container exits', async () => {
    const engine = new StubEngine();
    const out = await new DockerRuntime(engine).logs(handle, new AbortController().signal);
    engine.container.logStream.write('hello\n');
    engine.container.logStream.end('world\n');

    const chunks: string[] = [];
    for await (const chunk of out) chunks.push(chunk.toString());
    expect(chunks.join('')).toBe('hello\nworld\n');
  });

  it('ends the stream and releases the connection on abort', async () => {
    const engine = new StubEngine();
    const controller = new AbortController();
    const out = await new DockerRuntime(engine).logs(handle, controller.signal);
    setTimeout(() => controller.abort(), 10);

    const chunks: string[] = [];
    for await (const chunk of out) chunks.push(chunk.toString());
    expect(chunks).toEqual([]);
    expect(engine.container.logStream.destroyed).toBe(true);
  });
});

describe('DockerRuntime misc', () => {
  it('reports the exit code of a finished container', async () => {
    const engine = new StubEngine();
    engine.container.exitCode = 137;
    expect(await new DockerRuntime(engine).wait(handle)).toEqual({ exitCode: 137 });
  });

  it('pings the daemon', async () => {
    const engine = new StubEngine();
    expect(await new DockerRuntime(engine).ping()).toBe(true);
    engine.pingError = new Error('connect ENOENT /var/run/docker.sock');
    expect(await new DockerRuntime(engine).ping()).toBe(false);
  });

  it('maps daemon states and shortens ids', () => {
    expect(mapDockerState('created')).toBe('created');
    expect(mapDockerState('paused')).toBe('running');
    expect(mapDockerState('dead')).toBe('exited');
    expect(shortId('c0ffee1234567890abcdef')).toBe('c0ffee123456');
  });
});
