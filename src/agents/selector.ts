import type { AgentSelector } from './types.js';
import type { AnalysisResult } from '../types/shared.js';
import { loadKeywordTable, type KeywordTable } from './analyzer.js';

export const MAX_AGENTS = 4;

export class DomainAgentSelector implements AgentSelector {
  private table: KeywordTable;

  constructor(table: KeywordTable = loadKeywordTable()) {
    this.table = table;
  }

  select(_idea: string, analysis: AnalysisResult, forced?: readonly string[]): string[] {
    if (forced && forced.length > 0) return [...new Set(forced)];

    const agents: string[] = [];
    for (const domain of analysis.domains) {
      const agent = this.table.agents[domain];
      if (agent && !agents.includes(agent)) agents.push(agent);
    }
    if (agents.length === 0) agents.push(this.table.defaultAgent);
    return agents.slice(0, MAX_AGENTS);
  }
}
