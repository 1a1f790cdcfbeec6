import { z } from 'zod';
import type { ExecutionContext } from '../types/shared.js';
import { fail, failure, ok, type Result } from '../errors.js';
import { parseTimeout } from '../sandbox/timeout.js';

export const KNOWN_MODELS = ['opus', 'sonnet', 'haiku'] as const;

const RunInputSchema = z.object({
  idea: z.string().trim()
    .min(1, 'Project idea cannot be empty')
    .min(10, 'Project idea should be at least 10 characters'),
  model: z.string().trim().refine(
    m => KNOWN_MODELS.some(k => k === m) || /^claude-[a-z0-9.-]+$/.test(m),
    { message: `Invalid model. Choose from: ${KNOWN_MODELS.join(', ')}, or a full claude-* model id` },
  ),
  timeout: z.union([z.string(), z.number()]),
  keepContainer: z.boolean().default(false),
  forceRebuild: z.boolean().default(false),
  agents: z.array(z.string().trim().min(1)).default([]),
});

export type RunInput = z.input<typeof RunInputSchema>;

/** Split "a, b,,c" into agent ids; "auto" or empty means no forced selection. */
export function parseAgentList(raw: string | undefined): string[] {
  if (!raw || raw.trim().toLowerCase() === 'auto') return [];
  return raw.split(',').map(a => a.trim()).filter(Boolean);
}

/**
 * Validate caller input into an immutable execution context. Runs before any
 * resource is provisioned so bad input never reaches Docker.
 */
export function buildExecutionContext(input: RunInput): Result<ExecutionContext> {
  const parsed = RunInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return fail(failure('ValidationError', `${where}${issue.message}`));
  }

  const timeout = parseTimeout(parsed.data.timeout);
  if (!timeout.ok) return timeout;

  return ok(Object.freeze({
    idea: parsed.data.idea,
    model: parsed.data.model,
    timeout: timeout.value,
    keepContainer: parsed.data.keepContainer,
    forceRebuild: parsed.data.forceRebuild,
    agents: Object.freeze([...parsed.data.agents]),
  }));
}
