import type { AnalysisResult, ExecutionContext, WorkspaceLayout } from '../types/shared.js';

export interface IdeaAnalyzer {
  analyze(idea: string): AnalysisResult;
}

export interface AgentSelector {
  select(idea: string, analysis: AnalysisResult, forced?: readonly string[]): string[];
}

export interface ConfigRenderer {
  /** Write the agent configuration into the workspace; returns the configuration directory. */
  render(context: ExecutionContext, workspace: WorkspaceLayout, analysis: AnalysisResult): string;
}
