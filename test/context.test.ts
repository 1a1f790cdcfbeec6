import { describe, it, expect } from 'vitest';
import { buildExecutionContext, parseAgentList } from '../src/orchestrator/context.js';

describe('buildExecutionContext', () => {
  it('builds an immutable context with defaults', () => {
    const result = buildExecutionContext({ idea: '  Create a REST API for a blog  ', model: 'opus', timeout: '30m' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      idea: 'Create a REST API for a blog',
      model: 'opus',
      timeout: { kind: 'deadline', seconds: 1800 },
      keepContainer: false,
      forceRebuild: false,
      agents: [],
    });
    expect(Object.isFrozen(result.value)).toBe(true);
    expect(Object.isFrozen(result.value.agents)).toBe(true);
  });

  it('accepts full model ids', () => {
    const result = buildExecutionContext({ idea: 'Create a REST API for a blog', model: 'claude-sonnet-4-5', timeout: 0 });
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.timeout).toEqual({ kind: 'unlimited' });
  });

  it('rejects an empty idea', () => {
    const result = buildExecutionContext({ idea: '   ', model: 'opus', timeout: 'unlimited' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.category).toBe('ValidationError');
      expect(result.error.message).toBe('idea: Project idea cannot be empty');
    }
  });

  it('rejects a very short idea', () => {
    const result = buildExecutionContext({ idea: 'todo app', model: 'opus', timeout: 'unlimited' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('idea: Project idea should be at least 10 characters');
  });

  it('rejects an unknown model', () => {
    const result = buildExecutionContext({ idea: 'Create a REST API for a blog', model: 'gpt-4o', timeout: 'unlimited' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toMatch(/^model: Invalid model\. Choose from: opus, sonnet, haiku/);
  });

  it('passes through timeout validation errors', () => {
    const result = buildExecutionContext({ idea: 'Create a REST API for a blog', model: 'opus', timeout: 'soon' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.category).toBe('ValidationError');
      expect(result.error.message).toContain('Invalid timeout format: "soon"');
    }
  });
});

describe('parseAgentList', () => {
  it('splits and trims comma-separated ids', () => {
    expect(parseAgentList('backend-engineer, ,frontend-engineer ')).toEqual(['backend-engineer', 'frontend-engineer']);
  });

  it('treats auto and empty as no selection', () => {
    expect(parseAgentList(undefined)).toEqual([]);
    expect(parseAgentList('')).toEqual([]);
    expect(parseAgentList('AUTO')).toEqual([]);
  });
});
