export const ErrorCategory = [
  'FilesystemError',
  'BuildError',
  'RuntimeStartError',
  'StreamError',
  'TimeoutExceeded',
  'Cancelled',
  'UnclassifiedFailure',
  'AgentFailure',
  'ValidationError',
] as const;
export type ErrorCategoryType = typeof ErrorCategory[number];

const RECOVERY_HINTS: Record<ErrorCategoryType, string> = {
  FilesystemError: 'Check that the output directory exists and is writable, or pass --output-dir.',
  BuildError: 'Inspect the build output above, fix the Dockerfile or build context, then retry with --rebuild.',
  RuntimeStartError: "Ensure Docker is running and reachable. Check the daemon with 'docker info'.",
  StreamError: 'The container log stream was interrupted. Inspect the container with --keep-container.',
  TimeoutExceeded: "Increase the limit with --timeout (e.g. 2h) or use 'unlimited' for large projects.",
  Cancelled: 'The run was interrupted. Partial output may remain in the workspace.',
  UnclassifiedFailure: 'Re-run with --verbose and --keep-container to inspect the agent output.',
  AgentFailure: 'The agent reported a fatal error. Review the log tail and adjust the idea or model.',
  ValidationError: 'Check the command arguments. Use --help for accepted formats.',
};

export interface ExecutionFailure {
  category: ErrorCategoryType;
  message: string;
  hint: string;
  detail?: string;
  logTail?: string[];
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ExecutionFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: ExecutionFailure): Result<T> {
  return { ok: false, error };
}

export function failure(
  category: ErrorCategoryType,
  message: string,
  extra: { detail?: string; hint?: string } = {},
): ExecutionFailure {
  const out: ExecutionFailure = {
    category,
    message,
    hint: extra.hint ?? RECOVERY_HINTS[category],
  };
  if (extra.detail) out.detail = extra.detail;
  return out;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Wrap a thrown value as a failure of the given category, prefixing the operation that failed. */
export function fromUnknown(category: ErrorCategoryType, err: unknown, operation?: string): ExecutionFailure {
  const msg = errorMessage(err);
  return failure(category, operation ? `${operation}: ${msg}` : msg);
}

export function formatFailure(f: ExecutionFailure): string {
  const parts = [`[${f.category}] ${f.message}`];
  if (f.detail) parts.push(`Detail: ${f.detail}`);
  parts.push(`Hint: ${f.hint}`);
  return parts.join('\n');
}
