import Dockerode from 'dockerode';
import type { Config } from '../config/index.js';
import type { DockerEngine } from '../sandbox/engine.js';
import { Orchestrator } from './index.js';
import { WorkspaceManager } from '../workspace/manager.js';
import { DockerImageProvisioner } from '../sandbox/image.js';
import { DockerRuntime } from '../sandbox/docker.js';
import { KeywordAnalyzer, loadKeywordTable } from '../agents/analyzer.js';
import { DomainAgentSelector } from '../agents/selector.js';
import { TemplateConfigRenderer } from '../agents/renderer.js';

export function createOrchestrator(config: Config, docker: DockerEngine = new Dockerode()): Orchestrator {
  const table = loadKeywordTable();
  return new Orchestrator({
    workspaces: new WorkspaceManager({ outputBase: config.workspace.outputBase }),
    images: new DockerImageProvisioner(docker, {
      name: config.image.name,
      tag: config.image.tag,
      buildContext: config.image.buildContext,
    }),
    runtime: new DockerRuntime(docker),
    analyzer: new KeywordAnalyzer(table),
    selector: new DomainAgentSelector(table),
    renderer: new TemplateConfigRenderer(),
    apiKey: config.credentials.apiKey,
    stopGraceSeconds: config.execution.stopGraceSeconds,
    tailLines: config.execution.tailLines,
  });
}
