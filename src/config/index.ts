import { z } from 'zod';
import { fileURLToPath } from 'url';

export const DEFAULT_BUILD_CONTEXT = fileURLToPath(new URL('../../docker', import.meta.url));

const ConfigSchema = z.object({
  image: z.object({
    name: z.string().min(1).default('idea-forge'),
    tag: z.string().min(1).default('latest'),
    buildContext: z.string().default(DEFAULT_BUILD_CONTEXT),
  }),
  workspace: z.object({
    outputBase: z.string().default(process.cwd()),
  }),
  execution: z.object({
    defaultModel: z.string().default('opus'),
    defaultTimeout: z.string().default('unlimited'),
    stopGraceSeconds: z.coerce.number().int().nonnegative().default(10),
    tailLines: z.coerce.number().int().positive().default(50),
  }),
  credentials: z.object({
    apiKey: z.string().default(''),
  }),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
  return ConfigSchema.parse({
    image: {
      name: process.env.FORGE_IMAGE || undefined,
      tag: process.env.FORGE_IMAGE_TAG || undefined,
      buildContext: process.env.FORGE_BUILD_CONTEXT || undefined,
    },
    workspace: {
      outputBase: process.env.FORGE_OUTPUT_DIR || undefined,
    },
    execution: {
      defaultModel: process.env.FORGE_MODEL || undefined,
      defaultTimeout: process.env.FORGE_TIMEOUT || undefined,
      stopGraceSeconds: process.env.FORGE_STOP_GRACE?.trim() || undefined,
      tailLines: process.env.FORGE_TAIL_LINES?.trim() || undefined,
    },
    credentials: {
      apiKey: process.env.ANTHROPIC_API_KEY || undefined,
    },
    log: {
      level: process.env.FORGE_LOG_LEVEL || undefined,
    },
  });
}
