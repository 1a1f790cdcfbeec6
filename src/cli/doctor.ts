import { existsSync, mkdirSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/index.js';
import { WORKSPACE_DIRS } from '../types/shared.js';
import { errorMessage } from '../errors.js';

export interface HealthCheck {
  component: string;
  ok: boolean;
  detail: string;
}

export interface EngineProbe {
  ping(): Promise<boolean>;
}

export async function runDoctorChecks(config: Config, engine: EngineProbe): Promise<HealthCheck[]> {
  const checks: HealthCheck[] = [];

  const reachable = await engine.ping();
  checks.push({
    component: 'Docker',
    ok: reachable,
    detail: reachable ? 'daemon reachable' : 'daemon not reachable',
  });

  const dockerfile = join(config.image.buildContext, 'Dockerfile');
  const hasDockerfile = existsSync(dockerfile);
  checks.push({
    component: 'Build context',
    ok: hasDockerfile,
    detail: hasDockerfile ? config.image.buildContext : `missing ${dockerfile}`,
  });

  const outputDir = join(config.workspace.outputBase, WORKSPACE_DIRS.BASE);
  try {
    mkdirSync(outputDir, { recursive: true });
    const probe = join(outputDir, '.forge_write_test');
    writeFileSync(probe, 'test');
    unlinkSync(probe);
    checks.push({ component: 'Output directory', ok: true, detail: `${outputDir} writable` });
  } catch (err) {
    checks.push({ component: 'Output directory', ok: false, detail: errorMessage(err) });
  }

  checks.push({
    component: 'Credentials',
    ok: config.credentials.apiKey.length > 0,
    detail: config.credentials.apiKey ? 'ANTHROPIC_API_KEY set' : 'ANTHROPIC_API_KEY not set',
  });

  return checks;
}
