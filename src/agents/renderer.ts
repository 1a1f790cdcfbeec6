import { writeFileSync } from 'fs';
import { join } from 'path';
import type { ConfigRenderer } from './types.js';
import type { AnalysisResult, ExecutionContext, WorkspaceLayout } from '../types/shared.js';
import { CONTAINER_PATHS } from '../types/shared.js';

const STARTUP_TEMPLATE = `#!/bin/sh
set -e
cd ${CONTAINER_PATHS.OUTPUT}
echo "Starting agent session (model: $MODEL)"

if [ -z "$ANTHROPIC_API_KEY" ]; then
  echo "FATAL: ANTHROPIC_API_KEY is not set inside the container"
  exit 1
fi

{{AGENT_COMMAND}} --dangerously-skip-permissions --model "$MODEL" --print "$(cat ${CONTAINER_PATHS.CONFIG}/prompt.md)"

echo "Generated files:"
ls -la ${CONTAINER_PATHS.OUTPUT}
echo "Project generation complete"
`;

export function buildPrompt(idea: string, agents: readonly string[], analysis: AnalysisResult): string {
  const lines = [
    `Create a complete software project based on this idea: "${idea}"`,
    '',
    'Instructions:',
    '1. Analyze the requirements and create a full project structure.',
    '2. Generate all source code, configuration and documentation.',
    '3. Follow the conventions of the chosen technology stack.',
    '4. Write a README with setup and usage instructions.',
    '5. Include build scripts, package files and any configuration the project needs.',
    '',
    `Work in ${CONTAINER_PATHS.OUTPUT}. Print a short summary when you are done.`,
  ];
  if (agents.length > 0) lines.push('', `Roles to cover: ${agents.join(', ')}`);
  if (analysis.technologies.length > 0) lines.push(`Preferred technologies: ${analysis.technologies.join(', ')}`);
  return lines.join('\n') + '\n';
}

export class TemplateConfigRenderer implements ConfigRenderer {
  private agentCommand: string;

  constructor(agentCommand = 'claude') {
    this.agentCommand = agentCommand;
  }

  render(context: ExecutionContext, workspace: WorkspaceLayout, analysis: AnalysisResult): string {
    const dir = workspace.configDir;

    writeFileSync(join(dir, 'context.json'), JSON.stringify({
      idea: context.idea,
      model: context.model,
      agents: context.agents,
      analysis,
      createdAt: workspace.createdAt,
    }, null, 2));

    writeFileSync(join(dir, 'prompt.md'), buildPrompt(context.idea, context.agents, analysis));
    writeFileSync(
      join(dir, 'startup.sh'),
      STARTUP_TEMPLATE.replace('{{AGENT_COMMAND}}', this.agentCommand),
      { mode: 0o755 },
    );

    return dir;
  }
}
