import { StringDecoder } from 'string_decoder';
import type { ContainerRuntime } from './types.js';
import type { ContainerHandle } from '../types/shared.js';
import { fromUnknown, type ExecutionFailure } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('logs');

export type LogEvent =
  | { type: 'line'; line: string }
  | { type: 'error'; error: ExecutionFailure };

export type LineSignal =
  | { kind: 'progress'; line: string }
  | { kind: 'done'; line: string; marker: string }
  | { kind: 'failed'; line: string; detail?: string };

export type ClassifierState = 'running' | 'done' | 'failed';

export interface MarkerSet {
  completion: string[];           // case-insensitive substrings
  fatal: RegExp[];                // first capture group, if any, is the detail
}

export const DEFAULT_MARKERS: MarkerSet = {
  completion: [
    'Project generation complete',
    'All tasks completed',
    'Generation successful',
    'Agent session ended',
  ],
  fatal: [
    /^\s*FATAL(?: ERROR)?:\s*(.*)$/i,
    /^\s*AGENT ERROR:\s*(.*)$/i,
  ],
};

export function classifyLine(line: string, markers: MarkerSet = DEFAULT_MARKERS): LineSignal {
  for (const pattern of markers.fatal) {
    const m = line.match(pattern);
    if (m) {
      const detail = m[1]?.trim();
      return detail ? { kind: 'failed', line, detail } : { kind: 'failed', line };
    }
  }
  const lower = line.toLowerCase();
  const marker = markers.completion.find(c => lower.includes(c.toLowerCase()));
  if (marker) return { kind: 'done', line, marker };
  return { kind: 'progress', line };
}

/**
 * Tracks the terminal signal of a log stream. The first completion or fatal
 * marker wins; later lines are still classified but never change the state.
 */
export class LineClassifier {
  state: ClassifierState = 'running';
  terminal: LineSignal | null = null;
  observed = 0;
  private markers: MarkerSet;

  constructor(markers: MarkerSet = DEFAULT_MARKERS) {
    this.markers = markers;
  }

  observe(line: string): LineSignal {
    this.observed++;
    const signal = classifyLine(line, this.markers);
    if (this.state === 'running' && signal.kind !== 'progress') {
      this.state = signal.kind;
      this.terminal = signal;
    }
    return signal;
  }
}

export async function* splitLines(chunks: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let buffer = '';
  for await (const chunk of chunks) {
    buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    let idx = buffer.indexOf('\n');
    while (idx !== -1) {
      yield buffer.slice(0, idx).replace(/\r$/, '');
      buffer = buffer.slice(idx + 1);
      idx = buffer.indexOf('\n');
    }
  }
  buffer += decoder.end();
  if (buffer.length > 0) yield buffer.replace(/\r$/, '');
}

/**
 * Iterate `source` until it ends or `signal` aborts. An abort resolves a
 * pending read immediately instead of waiting for the next item.
 */
export async function* abortable<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T> {
  if (signal.aborted) return;
  const it = source[Symbol.asyncIterator]();
  let onAbort = () => {};
  const aborted = new Promise<'aborted'>((resolve) => {
    onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    while (true) {
      const pending = it.next();
      const next = await Promise.race([pending, aborted]);
      if (next === 'aborted') {
        void pending.catch((err: unknown) => log.debug('Log source failed after abort', err));
        return;
      }
      if (next.done) return;
      yield next.value;
      if (signal.aborted) return;
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
    // A pending read may still hold the iterator; release it without waiting
    void it.return?.().catch((err: unknown) => log.debug('Log source close failed', err));
  }
}

export class LogMonitor {
  private runtime: Pick<ContainerRuntime, 'logs'>;

  constructor(runtime: Pick<ContainerRuntime, 'logs'>) {
    this.runtime = runtime;
  }

  /**
   * Container output as lines, in emission order. Ends when the container
   * exits or `signal` aborts; a transport failure ends it with an error event.
   */
  async *stream(handle: ContainerHandle, signal: AbortSignal): AsyncGenerator<LogEvent> {
    let source: AsyncIterable<string | Buffer>;
    try {
      source = await this.runtime.logs(handle, signal);
    } catch (err) {
      if (signal.aborted) return;
      yield { type: 'error', error: fromUnknown('StreamError', err, 'Cannot attach to container logs') };
      return;
    }

    try {
      for await (const line of abortable(splitLines(source), signal)) {
        yield { type: 'line', line };
      }
    } catch (err) {
      if (signal.aborted) return;
      yield { type: 'error', error: fromUnknown('StreamError', err, 'Log stream interrupted') };
    }
  }
}

/** Keeps the last `size` lines for diagnostics. */
export class LogTail {
  private lines: string[] = [];
  private size: number;

  constructor(size: number) {
    this.size = size;
  }

  push(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.size) this.lines.shift();
  }

  snapshot(): string[] {
    return [...this.lines];
  }
}
