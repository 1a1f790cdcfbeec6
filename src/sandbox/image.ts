import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { ImageProvisioner } from './types.js';
import type { DockerEngine } from './engine.js';
import type { ImageRef } from '../types/shared.js';
import { fail, failure, fromUnknown, ok, type Result } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { dockerStatusCode } from './docker.js';

const log = createLogger('image');

const BuildEventSchema = z.object({
  stream: z.string().optional(),
  error: z.string().optional(),
  errorDetail: z.object({ message: z.string().optional() }).optional(),
  aux: z.object({ ID: z.string().optional() }).optional(),
}).passthrough();

type BuildEvent = z.infer<typeof BuildEventSchema>;

export interface ImageOptions {
  name: string;
  tag: string;
  buildContext: string;
}

export function listContextFiles(dir: string): string[] {
  return readdirSync(dir, { encoding: 'utf8', recursive: true })
    .filter(rel => statSync(join(dir, rel)).isFile())
    .sort();
}

/** First error reported in a build progress stream, if any. */
export function findBuildError(events: unknown[]): string | undefined {
  for (const raw of events) {
    const parsed = BuildEventSchema.safeParse(raw);
    if (!parsed.success) continue;
    const ev: BuildEvent = parsed.data;
    if (ev.error || ev.errorDetail) {
      return ev.errorDetail?.message || ev.error || 'unknown build error';
    }
  }
  return undefined;
}

export class DockerImageProvisioner implements ImageProvisioner {
  private docker: DockerEngine;
  private opts: ImageOptions;

  constructor(docker: DockerEngine, opts: ImageOptions) {
    this.docker = docker;
    this.opts = opts;
  }

  get ref(): string {
    return `${this.opts.name}:${this.opts.tag}`;
  }

  async ensure(forceRebuild: boolean): Promise<Result<ImageRef>> {
    const ref = this.ref;

    if (!forceRebuild) {
      try {
        const info = await this.docker.getImage(ref).inspect();
        log.info(`Using existing image ${ref}`);
        return ok({ name: ref, id: info.Id, built: false });
      } catch (err) {
        if (dockerStatusCode(err) !== 404) {
          return fail(fromUnknown('BuildError', err, `Cannot inspect image ${ref}`));
        }
        // Not present locally, fall through to build
      }
    }

    return this.build(ref, forceRebuild);
  }

  private async build(ref: string, noCache: boolean): Promise<Result<ImageRef>> {
    const context = this.opts.buildContext;
    if (!existsSync(join(context, 'Dockerfile'))) {
      return fail(failure('BuildError', `No Dockerfile in build context ${context}`));
    }

    log.info(`Building image ${ref}${noCache ? ' (no cache)' : ''}...`);
    let events: unknown[];
    try {
      const stream = await this.docker.buildImage(
        { context, src: listContextFiles(context) },
        { t: ref, nocache: noCache, rm: true, forcerm: true },
      );
      events = await new Promise<unknown[]>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: Error | null, output: unknown[]) => {
            if (err) reject(err);
            else resolve(output);
          },
          (event: unknown) => {
            const parsed = BuildEventSchema.safeParse(event);
            const text = parsed.success ? parsed.data.stream?.trim() : undefined;
            if (text) log.debug(text);
          },
        );
      });
    } catch (err) {
      log.error(`Image build failed for ${ref}`, err);
      return fail(fromUnknown('BuildError', err, 'Image build failed'));
    }

    const buildError = findBuildError(events);
    if (buildError) {
      log.error(`Image build failed for ${ref}: ${buildError}`);
      return fail(failure('BuildError', `Image build failed for ${ref}`, { detail: buildError }));
    }

    log.info(`Image ${ref} built`);
    return ok({ name: ref, built: true });
  }
}
