#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { realpathSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { z, ZodError } from 'zod';
import { loadConfig, type Config } from '../config/index.js';
import { buildExecutionContext, parseAgentList, type RunInput } from '../orchestrator/context.js';
import { createOrchestrator } from '../orchestrator/factory.js';
import { exitCodeFor } from '../orchestrator/index.js';
import { DockerRuntime } from '../sandbox/docker.js';
import { describeTimeout } from '../sandbox/timeout.js';
import { WorkspaceManager, type PruneOptions } from '../workspace/manager.js';
import { runDoctorChecks } from './doctor.js';
import { fail, failure, formatFailure, errorMessage, ok, type Result } from '../errors.js';
import { EXIT_FAILURE, type ExecutionResult } from '../types/shared.js';
import { registerSecret, setLogLevel } from '../utils/logger.js';
import { VERSION } from '../version.js';

export interface RunCommandOptions {
  model?: string;
  timeout?: string;
  agents?: string;
  keepContainer?: boolean;
  rebuild?: boolean;
  outputDir?: string;
  verbose?: boolean;
}

export function resolveRunInput(ideaParts: string[], opts: RunCommandOptions, config: Config): RunInput {
  return {
    idea: ideaParts.join(' '),
    model: opts.model ?? config.execution.defaultModel,
    timeout: opts.timeout ?? config.execution.defaultTimeout,
    keepContainer: opts.keepContainer ?? false,
    forceRebuild: opts.rebuild ?? false,
    agents: parseAgentList(opts.agents),
  };
}

export function formatResult(result: ExecutionResult): string[] {
  const lines = [
    `Status:    ${result.status}`,
    `Elapsed:   ${(result.elapsedMs / 1000).toFixed(1)}s`,
  ];
  if (result.outputPath) lines.push(`Output:    ${result.outputPath}`);
  if (result.containerId) lines.push(`Container: ${result.containerId.slice(0, 12)}`);
  if (result.agents.length > 0) lines.push(`Agents:    ${result.agents.join(', ')}`);
  if (result.error) {
    lines.push('', formatFailure(result.error));
    if (result.error.logTail && result.error.logTail.length > 0) {
      lines.push('', 'Last log lines:', ...result.error.logTail.slice(-10).map(l => `  ${l}`));
    }
  }
  return lines;
}

const count = z.string().trim().min(1).pipe(z.coerce.number().int().nonnegative());

const CleanOptionsSchema = z.object({
  maxAgeDays: count,
  keep: count,
});

export interface CleanCommandOptions {
  maxAgeDays: string;
  keep: string;
  outputDir?: string;
}

export function parseCleanOptions(opts: CleanCommandOptions): Result<PruneOptions> {
  const parsed = CleanOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = issue.path[0] === 'keep' ? '--keep' : '--max-age-days';
    return fail(failure('ValidationError', `${flag}: expected a non-negative integer (${issue.message})`));
  }
  return ok({ maxAgeDays: parsed.data.maxAgeDays, keepCount: parsed.data.keep });
}

function loadConfigOrExit(): Config | null {
  try {
    return loadConfig();
  } catch (err) {
    const message = err instanceof ZodError
      ? err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
      : errorMessage(err);
    console.error(`Invalid configuration: ${message}`);
    process.exitCode = EXIT_FAILURE;
    return null;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('forge')
    .description('Generate a complete software project from an idea with an AI agent in a Docker sandbox')
    .version(VERSION);

  program
    .command('run')
    .description('Generate a project from a natural-language idea')
    .argument('<idea...>', 'Project idea or description')
    .option('-m, --model <model>', 'Model to use (opus, sonnet, haiku)')
    .option('-t, --timeout <timeout>', 'Execution timeout (e.g. 120, 30m, 2h, unlimited)')
    .option('-a, --agents <agents>', 'Comma-separated agent ids, or "auto"')
    .option('--keep-container', 'Keep the container after execution for inspection')
    .option('--rebuild', 'Rebuild the runtime image without cache')
    .option('-o, --output-dir <dir>', 'Base directory for workspaces')
    .option('-v, --verbose', 'Verbose logging')
    .action(async (ideaParts: string[], opts: RunCommandOptions) => {
      const config = loadConfigOrExit();
      if (!config) return;
      setLogLevel(opts.verbose ? 'debug' : config.log.level);
      registerSecret(config.credentials.apiKey);

      const context = buildExecutionContext(resolveRunInput(ideaParts, opts, config));
      if (!context.ok) {
        console.error(formatFailure(context.error));
        process.exitCode = EXIT_FAILURE;
        return;
      }

      const orchestrator = createOrchestrator({
        ...config,
        workspace: { outputBase: opts.outputDir ?? config.workspace.outputBase },
      });

      console.log(`Idea:    ${context.value.idea}`);
      console.log(`Model:   ${context.value.model}`);
      console.log(`Timeout: ${describeTimeout(context.value.timeout)}`);

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      let result: ExecutionResult;
      try {
        result = await orchestrator.execute(context.value, {
          signal: controller.signal,
          onLine: (line) => { process.stdout.write(`${line}\n`); },
        });
      } finally {
        process.removeListener('SIGINT', onSigint);
      }

      const lines = formatResult(result);
      if (result.status === 'success') console.log(['', ...lines].join('\n'));
      else console.error(['', ...lines].join('\n'));
      process.exitCode = exitCodeFor(result.status);
    });

  program
    .command('doctor')
    .description('Check Docker, the build context and the output directory')
    .action(async () => {
      const config = loadConfigOrExit();
      if (!config) return;
      const checks = await runDoctorChecks(config, new DockerRuntime());
      for (const c of checks) {
        console.log(`${c.ok ? 'ok  ' : 'FAIL'}  ${c.component.padEnd(18)}  ${c.detail}`);
      }
      if (checks.some(c => !c.ok)) process.exitCode = EXIT_FAILURE;
    });

  program
    .command('workspaces')
    .description('List generated workspaces, newest first')
    .option('-o, --output-dir <dir>', 'Base directory for workspaces')
    .action((opts: { outputDir?: string }) => {
      const config = loadConfigOrExit();
      if (!config) return;
      const manager = new WorkspaceManager({ outputBase: opts.outputDir ?? config.workspace.outputBase });
      for (const ws of manager.list()) {
        console.log(`${ws.name}  ${ws.outputDir}`);
      }
    });

  program
    .command('clean')
    .description('Delete old workspaces')
    .option('--max-age-days <days>', 'Only delete workspaces older than this', '7')
    .option('--keep <count>', 'Always keep this many newest workspaces', '10')
    .option('-o, --output-dir <dir>', 'Base directory for workspaces')
    .action((opts: CleanCommandOptions) => {
      const config = loadConfigOrExit();
      if (!config) return;
      const limits = parseCleanOptions(opts);
      if (!limits.ok) {
        console.error(formatFailure(limits.error));
        process.exitCode = EXIT_FAILURE;
        return;
      }
      const manager = new WorkspaceManager({ outputBase: opts.outputDir ?? config.workspace.outputBase });
      const removed = manager.prune(limits.value);
      if (!removed.ok) {
        console.error(formatFailure(removed.error));
        process.exitCode = EXIT_FAILURE;
        return;
      }
      console.log(`Removed ${removed.value.length} workspace(s).`);
    });

  return program;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  // Load .env from the current directory, then ~/.forge/.env
  loadDotenv({ path: ['.env', join(homedir(), '.forge', '.env')] });
  await createProgram().parseAsync();
}
