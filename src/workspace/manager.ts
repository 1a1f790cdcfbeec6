import { randomBytes } from 'crypto';
import { existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'fs';
import { join } from 'path';
import type { WorkspaceLayout } from '../types/shared.js';
import { WORKSPACE_DIRS } from '../types/shared.js';
import { fail, failure, fromUnknown, ok, type Result } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workspace');

const NAME_PATTERN = /^(\d{8})_(\d{6})_/;

export interface WorkspaceManagerOptions {
  outputBase: string;
  now?: () => Date;
  suffix?: () => string;
}

export interface PruneOptions {
  maxAgeDays: number;
  keepCount: number;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_`
    + `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

export function slugifyIdea(idea: string): string {
  const slug = idea.slice(0, 30).replace(/[^A-Za-z0-9_-]/g, '').replace(/^[-_]+|[-_]+$/g, '');
  return slug || 'project';
}

function parseTimestamp(name: string): Date | null {
  const m = name.match(NAME_PATTERN);
  if (!m) return null;
  const [d, t] = [m[1], m[2]];
  return new Date(
    Number(d.slice(0, 4)), Number(d.slice(4, 6)) - 1, Number(d.slice(6, 8)),
    Number(t.slice(0, 2)), Number(t.slice(2, 4)), Number(t.slice(4, 6)),
  );
}

export class WorkspaceManager {
  private baseDir: string;
  private now: () => Date;
  private suffix: () => string;

  constructor(opts: WorkspaceManagerOptions) {
    this.baseDir = join(opts.outputBase, WORKSPACE_DIRS.BASE);
    this.now = opts.now ?? (() => new Date());
    this.suffix = opts.suffix ?? (() => randomBytes(2).toString('hex'));
  }

  get base(): string {
    return this.baseDir;
  }

  create(idea: string): Result<WorkspaceLayout> {
    const createdAt = this.now();
    const name = `${formatTimestamp(createdAt)}_${slugifyIdea(idea)}_${this.suffix()}`;
    const root = join(this.baseDir, name);
    const layout: WorkspaceLayout = {
      name,
      root,
      configDir: join(root, WORKSPACE_DIRS.CONFIG),
      outputDir: join(root, WORKSPACE_DIRS.OUTPUT),
      createdAt: createdAt.toISOString(),
    };

    try {
      mkdirSync(this.baseDir, { recursive: true });
      // Non-recursive: an existing root must fail, never be reused
      mkdirSync(root);
      mkdirSync(layout.configDir);
      mkdirSync(layout.outputDir);
    } catch (err) {
      log.error(`Failed to create workspace ${root}`, err);
      return fail(fromUnknown('FilesystemError', err, 'Workspace creation failed'));
    }

    log.info(`Workspace prepared: ${root}`);
    return ok(layout);
  }

  /** Existing workspaces, newest first. */
  list(): WorkspaceLayout[] {
    if (!existsSync(this.baseDir)) return [];
    const names = readdirSync(this.baseDir);
    const found: Array<{ layout: WorkspaceLayout; at: Date }> = [];
    for (const name of names) {
      const at = parseTimestamp(name);
      const root = join(this.baseDir, name);
      if (!at || !statSync(root).isDirectory()) continue;
      found.push({
        at,
        layout: {
          name,
          root,
          configDir: join(root, WORKSPACE_DIRS.CONFIG),
          outputDir: join(root, WORKSPACE_DIRS.OUTPUT),
          createdAt: at.toISOString(),
        },
      });
    }
    return found
      .sort((a, b) => b.at.getTime() - a.at.getTime() || b.layout.name.localeCompare(a.layout.name))
      .map(f => f.layout);
  }

  /**
   * Delete workspaces beyond the newest `keepCount` that are also older than `maxAgeDays`.
   * Returns the removed roots. Both limits must be non-negative integers.
   */
  prune(opts: PruneOptions): Result<string[]> {
    const limits: Array<[string, number]> = [['maxAgeDays', opts.maxAgeDays], ['keepCount', opts.keepCount]];
    for (const [name, value] of limits) {
      if (!Number.isInteger(value) || value < 0) {
        return fail(failure('ValidationError', `${name} must be a non-negative integer, got ${value}`));
      }
    }
    const now = this.now().getTime();
    const removed: string[] = [];
    this.list().forEach((ws, i) => {
      if (i < opts.keepCount) return;
      const ageDays = (now - new Date(ws.createdAt).getTime()) / 86_400_000;
      if (ageDays <= opts.maxAgeDays) return;
      try {
        rmSync(ws.root, { recursive: true, force: true });
        removed.push(ws.root);
        log.debug(`Removed old workspace ${ws.root}`);
      } catch (err) {
        log.warn(`Failed to remove workspace ${ws.root}`, err);
      }
    });
    if (removed.length > 0) log.info(`Cleaned up ${removed.length} old workspace(s)`);
    return ok(removed);
  }
}
