import type Dockerode from 'dockerode';
import { PassThrough } from 'stream';
import type { BuildOptions, ContainerApi, DockerEngine, ImageApi } from '../../src/sandbox/engine.js';

export function statusError(statusCode: number, message: string): Error & { statusCode: number } {
  return Object.assign(new Error(message), { statusCode });
}

/** Scripted container: each operation records itself and throws the queued error, if any. */
export class StubContainer implements ContainerApi {
  id: string;
  calls: string[] = [];
  startError: unknown = null;
  stopErrors: unknown[] = [];
  killErrors: unknown[] = [];
  removeErrors: unknown[] = [];
  inspectError: unknown = null;
  state = 'running';
  exitCode = 0;
  logStream = new PassThrough();

  constructor(id: string) {
    this.id = id;
  }

  async start(): Promise<void> {
    this.calls.push('start');
    if (this.startError) throw this.startError;
  }

  async stop(opts: { t: number }): Promise<void> {
    this.calls.push(`stop:${opts.t}`);
    const err = this.stopErrors.shift();
    if (err) throw err;
  }

  async kill(): Promise<void> {
    this.calls.push('kill');
    const err = this.killErrors.shift();
    if (err) throw err;
  }

  async remove(opts: { force: boolean }): Promise<void> {
    this.calls.push(`remove:${opts.force}`);
    const err = this.removeErrors.shift();
    if (err) throw err;
  }

  async inspect(): Promise<{ State: { Status: string } }> {
    this.calls.push('inspect');
    if (this.inspectError) throw this.inspectError;
    return { State: { Status: this.state } };
  }

  async logs(): Promise<NodeJS.ReadableStream> {
    return this.logStream;
  }

  async wait(): Promise<{ StatusCode: number }> {
    return { StatusCode: this.exitCode };
  }
}

export class StubImage implements ImageApi {
  inspectError: unknown = null;
  id = 'sha256:0123456789abcdef';
  inspected = 0;

  async inspect(): Promise<{ Id: string }> {
    this.inspected++;
    if (this.inspectError) throw this.inspectError;
    return { Id: this.id };
  }
}

/** In-process stand-in for the Docker daemon client. */
export class StubEngine implements DockerEngine {
  container = new StubContainer('c0ffee1234567890abcdef');
  image = new StubImage();
  created: Dockerode.ContainerCreateOptions[] = [];
  builds: Array<{ src: string[]; opts: BuildOptions }> = [];
  createError: unknown = null;
  pingError: unknown = null;
  buildError: unknown = null;
  /** Events the fake build reports once its stream is followed. */
  buildEvents: unknown[] = [{ stream: 'Step 1/4 : FROM node:20-slim\n' }, { aux: { ID: 'sha256:feed' } }];

  async ping(): Promise<string> {
    if (this.pingError) throw this.pingError;
    return 'OK';
  }

  async createContainer(opts: Dockerode.ContainerCreateOptions): Promise<ContainerApi> {
    this.created.push(opts);
    if (this.createError) throw this.createError;
    return this.container;
  }

  getContainer(): ContainerApi {
    return this.container;
  }

  getImage(): ImageApi {
    return this.image;
  }

  async buildImage(file: { context: string; src: string[] }, opts: BuildOptions): Promise<NodeJS.ReadableStream> {
    this.builds.push({ src: file.src, opts });
    if (this.buildError) throw this.buildError;
    return new PassThrough();
  }

  modem = {
    demuxStream: (stream: NodeJS.ReadableStream, stdout: NodeJS.WritableStream): void => {
      stream.pipe(stdout);
    },
    followProgress: (
      _stream: NodeJS.ReadableStream,
      onFinished: (err: Error | null, output: unknown[]) => void,
      onProgress?: (event: unknown) => void,
    ): void => {
      for (const event of this.buildEvents) onProgress?.(event);
      onFinished(null, this.buildEvents);
    },
  };
}
