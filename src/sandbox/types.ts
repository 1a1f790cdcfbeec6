import type { ContainerHandle, ContainerStatusType, ImageRef, WorkspaceLayout } from '../types/shared.js';
import type { Result } from '../errors.js';

export interface StartOptions {
  image: string;
  workspace: WorkspaceLayout;
  command: string[];
  env: Record<string, string>;
}

export interface CleanupOutcome {
  ok: boolean;
  attempts: number;
  error?: string;
}

export interface ContainerRuntime {
  start(opts: StartOptions): Promise<Result<ContainerHandle>>;
  /** Graceful stop, escalating to a forced kill after `graceSeconds`. Never throws. */
  stop(handle: ContainerHandle, graceSeconds: number): Promise<CleanupOutcome>;
  /** Best-effort deletion. Never throws. */
  remove(handle: ContainerHandle): Promise<CleanupOutcome>;
  status(handle: ContainerHandle): Promise<ContainerStatusType>;
  /** Raw output chunks in emission order; ends on container exit or abort. */
  logs(handle: ContainerHandle, signal: AbortSignal): Promise<AsyncIterable<string | Buffer>>;
  wait(handle: ContainerHandle): Promise<{ exitCode: number }>;
}

export interface ImageProvisioner {
  ensure(forceRebuild: boolean): Promise<Result<ImageRef>>;
}
