import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { IdeaAnalyzer } from './types.js';
import type { AnalysisResult } from '../types/shared.js';

const KeywordTableSchema = z.object({
  domains: z.record(z.array(z.string())),
  technologies: z.array(z.string()),
  agents: z.record(z.string()),
  defaultAgent: z.string(),
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export const KEYWORDS_PATH = fileURLToPath(new URL('../../data/keywords.json', import.meta.url));

export function loadKeywordTable(path: string = KEYWORDS_PATH): KeywordTable {
  return KeywordTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

function mentions(text: string, keyword: string): boolean {
  const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(text);
}

export class KeywordAnalyzer implements IdeaAnalyzer {
  private table: KeywordTable;

  constructor(table: KeywordTable = loadKeywordTable()) {
    this.table = table;
  }

  analyze(idea: string): AnalysisResult {
    const text = idea.toLowerCase();
    const domains = Object.entries(this.table.domains)
      .filter(([, words]) => words.some(w => mentions(text, w)))
      .map(([domain]) => domain);
    const technologies = this.table.technologies.filter(t => mentions(text, t));

    const words = text.split(/\s+/).filter(Boolean).length;
    let complexity: AnalysisResult['complexity'] = 'simple';
    if (domains.length > 2 || words > 40) complexity = 'complex';
    else if (domains.length > 1 || words > 15) complexity = 'moderate';

    return { domains, technologies, complexity };
  }
}
