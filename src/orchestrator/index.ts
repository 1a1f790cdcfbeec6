import type { AgentSelector, ConfigRenderer, IdeaAnalyzer } from '../agents/types.js';
import type { ContainerRuntime, ImageProvisioner } from '../sandbox/types.js';
import type {
  AnalysisResult, ContainerHandle, ExecutionContext, ExecutionResult, ExecutionState,
  ExecutionStatusType, TerminalState, WorkspaceLayout,
} from '../types/shared.js';
import type { WorkspaceManager } from '../workspace/manager.js';
import {
  CONTAINER_PATHS, EXIT_CANCELLED, EXIT_FAILURE, EXIT_SUCCESS, EXIT_TIMEOUT,
} from '../types/shared.js';
import { failure, fromUnknown, type ExecutionFailure } from '../errors.js';
import {
  DEFAULT_MARKERS, LineClassifier, LogMonitor, LogTail,
  type LineSignal, type MarkerSet,
} from '../sandbox/log-monitor.js';
import { TimeoutGuard, describeTimeout } from '../sandbox/timeout.js';
import { shortId } from '../sandbox/docker.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

export interface OrchestratorDeps {
  workspaces: Pick<WorkspaceManager, 'create'>;
  images: ImageProvisioner;
  runtime: ContainerRuntime;
  analyzer: IdeaAnalyzer;
  selector: AgentSelector;
  renderer: ConfigRenderer;
  apiKey: string;                 // injected into the container only
  stopGraceSeconds: number;
  tailLines: number;
  markers?: MarkerSet;
}

export interface RunHooks {
  signal?: AbortSignal;
  onLine?: (line: string, signal: LineSignal) => void;
  onTransition?: (from: ExecutionState, to: ExecutionState) => void;
}

export interface Outcome {
  state: TerminalState;
  error?: ExecutionFailure;
}

const STATUS_BY_STATE: Record<TerminalState, ExecutionStatusType> = {
  COMPLETED: 'success',
  FAILED: 'failure',
  TIMED_OUT: 'timeout',
  CANCELLED: 'cancelled',
};

const EXIT_BY_STATUS: Record<ExecutionStatusType, number> = {
  success: EXIT_SUCCESS,
  failure: EXIT_FAILURE,
  timeout: EXIT_TIMEOUT,
  cancelled: EXIT_CANCELLED,
};

export function exitCodeFor(status: ExecutionStatusType): number {
  return EXIT_BY_STATUS[status];
}

/** Holds the first outcome offered to it; later offers are ignored. */
export class TerminalLatch {
  private outcome: Outcome | null = null;
  private controller = new AbortController();

  /** Aborted as soon as an outcome is set. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get value(): Outcome | null {
    return this.outcome;
  }

  settle(outcome: Outcome): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    this.controller.abort();
    return true;
  }
}

function untilAborted(signal: AbortSignal): Promise<'aborted'> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve('aborted');
    else signal.addEventListener('abort', () => resolve('aborted'), { once: true });
  });
}

function markerFailure(signal: Extract<LineSignal, { kind: 'failed' }>): ExecutionFailure {
  if (signal.detail) {
    return failure('AgentFailure', 'Agent reported a fatal error', { detail: signal.detail });
  }
  return failure('UnclassifiedFailure', `Agent reported a fatal error without detail: ${signal.line.trim()}`);
}

/**
 * Runs one idea end to end: workspace, image, container, monitored log
 * stream, cleanup. Each instance executes exactly once.
 */
export class Orchestrator {
  private deps: OrchestratorDeps;
  private monitor: LogMonitor;
  private state: ExecutionState = 'INIT';
  private used = false;
  private cleaned = false;
  readonly history: ExecutionState[] = ['INIT'];

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.monitor = new LogMonitor(deps.runtime);
  }

  get currentState(): ExecutionState {
    return this.state;
  }

  async execute(context: ExecutionContext, hooks: RunHooks = {}): Promise<ExecutionResult> {
    if (this.used) throw new Error('Orchestrator instances run a single execution');
    this.used = true;

    const startedAt = Date.now();
    const tail = new LogTail(this.deps.tailLines);
    let workspace: WorkspaceLayout | null = null;
    let analysis: AnalysisResult | undefined;
    let agents: string[] = [...context.agents];
    let handle: ContainerHandle | null = null;

    const finish = (outcome: Outcome): ExecutionResult => {
      if (this.state !== outcome.state) this.moveTo(outcome.state, hooks);
      this.moveTo('CLEANED_UP', hooks);
      const status = STATUS_BY_STATE[outcome.state];
      const logTail = tail.snapshot();
      const result: ExecutionResult = {
        status,
        finalState: outcome.state,
        outputPath: workspace?.outputDir ?? null,
        workspacePath: workspace?.root ?? null,
        containerId: handle?.id ?? null,
        elapsedMs: Date.now() - startedAt,
        logTail,
        agents,
      };
      if (analysis) result.analysis = analysis;
      if (outcome.error) {
        result.error = logTail.length > 0 ? { ...outcome.error, logTail } : outcome.error;
        log.error(`Execution ${status}: [${outcome.error.category}] ${outcome.error.message}`);
      } else {
        log.info(`Execution ${status} in ${((result.elapsedMs) / 1000).toFixed(1)}s`);
      }
      return result;
    };

    const cancelled = (): Outcome => ({
      state: 'CANCELLED',
      error: failure('Cancelled', `Execution cancelled before the container started (${this.state})`),
    });

    log.info(`Starting execution: ${context.idea.length > 100 ? context.idea.slice(0, 100) + '...' : context.idea}`);
    if (hooks.signal?.aborted) return finish(cancelled());

    // Workspace
    const ws = this.deps.workspaces.create(context.idea);
    if (!ws.ok) return finish({ state: 'FAILED', error: ws.error });
    workspace = ws.value;
    this.moveTo('WORKSPACE_READY', hooks);

    // Configuration, via the external collaborators
    let ctx: ExecutionContext;
    try {
      analysis = this.deps.analyzer.analyze(context.idea);
      agents = this.deps.selector.select(context.idea, analysis, context.agents);
      ctx = Object.freeze({ ...context, agents: Object.freeze([...agents]), workspace });
      this.deps.renderer.render(ctx, workspace, analysis);
      log.info(`Selected agents: ${agents.join(', ')}`);
    } catch (err) {
      return finish({ state: 'FAILED', error: fromUnknown('FilesystemError', err, 'Configuration rendering failed') });
    }
    if (hooks.signal?.aborted) return finish(cancelled());

    // Image
    const image = await this.deps.images.ensure(ctx.forceRebuild);
    if (!image.ok) return finish({ state: 'FAILED', error: image.error });
    this.moveTo('IMAGE_READY', hooks);
    if (hooks.signal?.aborted) return finish(cancelled());

    // Container
    const env: Record<string, string> = { MODEL: ctx.model };
    if (this.deps.apiKey) env.ANTHROPIC_API_KEY = this.deps.apiKey;
    else log.warn('No ANTHROPIC_API_KEY configured; the agent will not be able to authenticate');

    const started = await this.deps.runtime.start({
      image: image.value.name,
      workspace,
      command: ['sh', CONTAINER_PATHS.STARTUP],
      env,
    });
    if (!started.ok) return finish({ state: 'FAILED', error: started.error });
    const running = started.value;
    handle = running;
    this.moveTo('CONTAINER_RUNNING', hooks);

    let outcome: Outcome;
    try {
      outcome = await this.monitorRun(running, ctx, tail, hooks);
      this.moveTo(outcome.state, hooks);
    } finally {
      await this.cleanup(running, ctx.keepContainer);
    }
    return finish(outcome);
  }

  /**
   * Race the log stream, the deadline and external cancellation. Whichever
   * settles the latch first decides the terminal state and stops the others.
   */
  private async monitorRun(
    handle: ContainerHandle,
    ctx: ExecutionContext,
    tail: LogTail,
    hooks: RunHooks,
  ): Promise<Outcome> {
    const latch = new TerminalLatch();
    const guard = new TimeoutGuard(ctx.timeout);
    const classifier = new LineClassifier(this.deps.markers ?? DEFAULT_MARKERS);
    const external = hooks.signal;

    guard.arm(() => {
      if (latch.settle({
        state: 'TIMED_OUT',
        error: failure('TimeoutExceeded', `Execution timed out after ${describeTimeout(ctx.timeout)}`),
      })) log.warn(`Deadline of ${describeTimeout(ctx.timeout)} reached, stopping container`);
    });
    const onCancel = () => {
      if (latch.settle({ state: 'CANCELLED', error: failure('Cancelled', 'Execution cancelled by user') })) {
        log.warn('Cancellation requested, stopping container');
      }
    };
    if (external?.aborted) onCancel();
    else external?.addEventListener('abort', onCancel, { once: true });

    try {
      for await (const event of this.monitor.stream(handle, latch.signal)) {
        if (latch.value) break;
        if (event.type === 'error') {
          latch.settle({ state: 'FAILED', error: event.error });
          break;
        }

        tail.push(event.line);
        const signal = classifier.observe(event.line);
        log.debug(`[container] ${event.line}`);
        hooks.onLine?.(event.line, signal);

        if (classifier.terminal === signal) {
          if (signal.kind === 'done') {
            latch.settle({ state: 'COMPLETED' });
            log.info(`Completion marker seen: "${signal.marker}"`);
          } else if (signal.kind === 'failed') {
            latch.settle({ state: 'FAILED', error: markerFailure(signal) });
          }
        }
        if (latch.value) break;
      }

      if (!latch.value) {
        // Stream closed on its own: the container exited
        const exit = await Promise.race([this.deps.runtime.wait(handle), untilAborted(latch.signal)]);
        if (exit !== 'aborted') {
          latch.settle(exit.exitCode === 0
            ? { state: 'COMPLETED' }
            : {
              state: 'FAILED',
              error: failure('UnclassifiedFailure', `Agent container exited with code ${exit.exitCode}`),
            });
        }
      }
    } catch (err) {
      latch.settle({ state: 'FAILED', error: fromUnknown('StreamError', err, 'Lost track of container') });
    } finally {
      guard.disarm();
      external?.removeEventListener('abort', onCancel);
    }

    return latch.value ?? {
      state: 'FAILED',
      error: failure('UnclassifiedFailure', 'Monitoring ended without a terminal state'),
    };
  }

  /** Stop, then remove unless kept. Runs at most once per execution; failures are logged only. */
  private async cleanup(handle: ContainerHandle, keepContainer: boolean): Promise<void> {
    if (this.cleaned) return;
    this.cleaned = true;
    const id = shortId(handle.id);

    try {
      const stopped = await this.deps.runtime.stop(handle, this.deps.stopGraceSeconds);
      if (!stopped.ok) log.warn(`Could not stop container ${id}: ${stopped.error}`);
    } catch (err) {
      log.warn(`Could not stop container ${id}`, err);
    }

    if (keepContainer) {
      log.info(`Container ${id} kept for inspection`);
      return;
    }

    try {
      const removed = await this.deps.runtime.remove(handle);
      if (!removed.ok) log.warn(`Could not remove container ${id}: ${removed.error}`);
    } catch (err) {
      log.warn(`Could not remove container ${id}`, err);
    }
  }

  private moveTo(next: ExecutionState, hooks: RunHooks): void {
    const prev = this.state;
    this.state = next;
    this.history.push(next);
    log.debug(`${prev} -> ${next}`);
    hooks.onTransition?.(prev, next);
  }
}
