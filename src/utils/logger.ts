export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = (line: string) => void;

interface LoggerState {
  level: LogLevel;
  secrets: string[];
  sink: LogSink;
}

const state: LoggerState = {
  level: 'info',
  secrets: [],
  sink: (line) => console.error(line),
};

export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

export function setLogSink(sink: LogSink): void {
  state.sink = sink;
}

/** Register a value that must never reach log output. */
export function registerSecret(value: string | undefined): void {
  if (value && value.length >= 4 && !state.secrets.includes(value)) {
    state.secrets.push(value);
  }
}

export function redact(text: string): string {
  let out = text;
  for (const s of state.secrets) {
    out = out.split(s).join('***');
  }
  return out;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

function emit(level: LogLevel, scope: string, message: string, data?: unknown): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(state.level)) return;
  const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
  const tag = level === 'info' ? scope : `${scope}/${level.toUpperCase()}`;
  state.sink(redact(`[${timestamp}] [${tag}] ${message}`));
  if (data === undefined) return;
  if (data instanceof Error) {
    state.sink(redact(`  Message: ${data.message}`));
    if (level === 'debug' && data.stack) state.sink(redact(`  Stack: ${data.stack}`));
  } else {
    state.sink(redact(`  ${JSON.stringify(data)}`));
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => emit('debug', scope, message, data),
    info: (message, data) => emit('info', scope, message, data),
    warn: (message, data) => emit('warn', scope, message, data),
    error: (message, error) => emit('error', scope, message, error),
  };
}
