export { Orchestrator, TerminalLatch, exitCodeFor } from './orchestrator/index.js';
export type { OrchestratorDeps, RunHooks, Outcome } from './orchestrator/index.js';
export { createOrchestrator } from './orchestrator/factory.js';
export { buildExecutionContext, parseAgentList, KNOWN_MODELS } from './orchestrator/context.js';
export type { RunInput } from './orchestrator/context.js';
export { WorkspaceManager } from './workspace/manager.js';
export { DockerImageProvisioner } from './sandbox/image.js';
export { DockerRuntime } from './sandbox/docker.js';
export { LogMonitor, LineClassifier, classifyLine, DEFAULT_MARKERS } from './sandbox/log-monitor.js';
export type { LogEvent, LineSignal, MarkerSet } from './sandbox/log-monitor.js';
export { TimeoutGuard, parseTimeout, describeTimeout } from './sandbox/timeout.js';
export type { ContainerRuntime, ImageProvisioner, StartOptions, CleanupOutcome } from './sandbox/types.js';
export type { DockerEngine, ContainerApi, ImageApi } from './sandbox/engine.js';
export type { IdeaAnalyzer, AgentSelector, ConfigRenderer } from './agents/types.js';
export { KeywordAnalyzer } from './agents/analyzer.js';
export { DomainAgentSelector } from './agents/selector.js';
export { TemplateConfigRenderer } from './agents/renderer.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export * from './errors.js';
export * from './types/shared.js';
export { VERSION } from './version.js';
