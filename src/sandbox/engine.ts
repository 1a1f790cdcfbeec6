import type Dockerode from 'dockerode';

/** The slice of a dockerode container the runtime drives. */
export interface ContainerApi {
  id: string;
  start(): Promise<unknown>;
  stop(opts: { t: number }): Promise<unknown>;
  kill(): Promise<unknown>;
  remove(opts: { force: boolean }): Promise<unknown>;
  inspect(): Promise<{ State: { Status: string } }>;
  logs(opts: { follow: true; stdout: boolean; stderr: boolean }): Promise<NodeJS.ReadableStream>;
  wait(): Promise<{ StatusCode: number }>;
}

export interface ImageApi {
  inspect(): Promise<{ Id: string }>;
}

export interface BuildOptions {
  t: string;
  nocache: boolean;
  rm: boolean;
  forcerm: boolean;
}

/**
 * The slice of the dockerode client used here. `new Dockerode()` satisfies it;
 * tests pass in-process stand-ins.
 */
export interface DockerEngine {
  ping(): Promise<unknown>;
  createContainer(opts: Dockerode.ContainerCreateOptions): Promise<ContainerApi>;
  getContainer(id: string): ContainerApi;
  getImage(name: string): ImageApi;
  buildImage(file: { context: string; src: string[] }, opts: BuildOptions): Promise<NodeJS.ReadableStream>;
  modem: {
    demuxStream(stream: NodeJS.ReadableStream, stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream): void;
    followProgress(
      stream: NodeJS.ReadableStream,
      onFinished: (err: Error | null, output: unknown[]) => void,
      onProgress?: (event: unknown) => void,
    ): void;
  };
}
