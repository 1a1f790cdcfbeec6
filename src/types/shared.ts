import type { ExecutionFailure } from '../errors.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_TIMEOUT = 2;
export const EXIT_CANCELLED = 130;

export const CONTAINER_PATHS = {
  WORKSPACE: '/workspace',
  CONFIG: '/workspace/config',
  OUTPUT: '/workspace/output',
  STARTUP: '/workspace/config/startup.sh',
} as const;

export const WORKSPACE_DIRS = {
  BASE: 'forge_output',
  CONFIG: 'config',
  OUTPUT: 'output',
} as const;

export const ExecutionStatus = [
  'success', 'timeout', 'failure', 'cancelled',
] as const;
export type ExecutionStatusType = typeof ExecutionStatus[number];

export const ContainerStatus = [
  'created', 'running', 'exited', 'removed',
] as const;
export type ContainerStatusType = typeof ContainerStatus[number];

export type ExecutionState =
  | 'INIT' | 'WORKSPACE_READY' | 'IMAGE_READY' | 'CONTAINER_RUNNING'
  | 'COMPLETED' | 'FAILED' | 'TIMED_OUT' | 'CANCELLED'
  | 'CLEANED_UP';

export type TerminalState = Extract<ExecutionState, 'COMPLETED' | 'FAILED' | 'TIMED_OUT' | 'CANCELLED'>;

export type TimeoutSpec =
  | { kind: 'unlimited' }
  | { kind: 'deadline'; seconds: number };

export interface WorkspaceLayout {
  name: string;                   // e.g. "20260118_142501_CreateatodolistappusingReact_a1b2"
  root: string;
  configDir: string;              // rendered agent configuration
  outputDir: string;              // generated project lands here
  createdAt: string;
}

export interface ExecutionContext {
  readonly idea: string;
  readonly model: string;
  readonly timeout: TimeoutSpec;
  readonly keepContainer: boolean;
  readonly forceRebuild: boolean;
  readonly agents: readonly string[];
  readonly workspace?: WorkspaceLayout;
}

export interface ContainerHandle {
  readonly id: string;
  readonly status: ContainerStatusType;
  readonly startedAt: string;
}

export interface ImageRef {
  name: string;                   // "<name>:<tag>"
  id?: string;
  built: boolean;                 // false when the cached image was reused
}

export interface AnalysisResult {
  domains: string[];
  technologies: string[];
  complexity: 'simple' | 'moderate' | 'complex';
}

export interface ExecutionResult {
  status: ExecutionStatusType;
  finalState: TerminalState;
  outputPath: string | null;
  workspacePath: string | null;
  containerId: string | null;
  elapsedMs: number;
  logTail: string[];
  agents: string[];
  analysis?: AnalysisResult;
  error?: ExecutionFailure;
}
