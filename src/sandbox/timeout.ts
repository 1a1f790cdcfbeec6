import type { TimeoutSpec } from '../types/shared.js';
import { fail, failure, ok, type Result } from '../errors.js';

const UNLIMITED = ['unlimited', 'none', '0'];
const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600 };

// setTimeout cannot hold more than 2^31-1 ms
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

/**
 * Parse a timeout given as integer seconds ("120"), a duration shorthand
 * ("45s", "30m", "2h") or an unlimited sentinel ("unlimited", "none", "0").
 */
export function parseTimeout(input: string | number): Result<TimeoutSpec> {
  const raw = String(input).trim().toLowerCase();
  if (UNLIMITED.includes(raw)) return ok({ kind: 'unlimited' });

  const match = raw.match(/^(\d+)([smh]?)$/);
  if (!match) {
    return fail(failure('ValidationError',
      `Invalid timeout format: "${input}". Use seconds (120), a duration (30m, 2h) or "unlimited"`));
  }

  const seconds = Number(match[1]) * UNIT_SECONDS[match[2] || 's'];
  if (seconds === 0) return ok({ kind: 'unlimited' });
  if (seconds > MAX_TIMEOUT_SECONDS) {
    return fail(failure('ValidationError',
      `Timeout "${input}" exceeds the maximum of ${MAX_TIMEOUT_SECONDS} seconds; use "unlimited" instead`));
  }
  return ok({ kind: 'deadline', seconds });
}

export function describeTimeout(spec: TimeoutSpec): string {
  if (spec.kind === 'unlimited') return 'unlimited';
  const s = spec.seconds;
  if (s % 3600 === 0) return `${s / 3600}h`;
  if (s % 60 === 0) return `${s / 60}m`;
  return `${s}s`;
}

export class TimeoutGuard {
  private spec: TimeoutSpec;
  private timer: NodeJS.Timeout | null = null;
  expired = false;

  constructor(spec: TimeoutSpec) {
    this.spec = spec;
  }

  get deadlineMs(): number | null {
    return this.spec.kind === 'deadline' ? this.spec.seconds * 1000 : null;
  }

  /** Schedule `onExpire` once after the deadline. No-op when unlimited or already armed. */
  arm(onExpire: () => void): void {
    const ms = this.deadlineMs;
    if (ms === null || this.timer || this.expired) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.expired = true;
      onExpire();
    }, ms);
  }

  disarm(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  get armed(): boolean {
    return this.timer !== null;
  }
}
