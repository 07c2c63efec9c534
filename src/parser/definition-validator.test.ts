import { describe, expect, it } from 'vitest';
import { DefinitionValidator } from './definition-validator.ts';
import type { Connector, Definition, StepDefinition } from './schema.ts';

const transform = (id: string, extra: Partial<StepDefinition> = {}): StepDefinition => ({
  id,
  type: 'transform',
  template: 'x',
  ...extra,
});

const workflow = (steps: StepDefinition[], extra: Partial<Definition> = {}): Definition => ({
  name: 'test-workflow',
  steps,
  ...extra,
});

const messages = (definition: Definition): string[] =>
  DefinitionValidator.validate(definition).map((error) => error.message);

const apiConnector: Connector = {
  base_url: 'https://api.example.test',
  auth: { token: '${API_TOKEN}' },
  operations: { get_user: { method: 'GET', path: '/users/{id}' } },
};

function nestedParallel(depth: number): StepDefinition {
  let step: StepDefinition = transform('leaf');
  for (let level = depth; level >= 1; level--) {
    step = { id: `p${level}`, type: 'parallel', steps: [step] };
  }
  return step;
}

describe('DefinitionValidator', () => {
  it('should accept a minimal workflow', () => {
    expect(DefinitionValidator.validate(workflow([transform('a')]))).toEqual([]);
  });

  it('should require a name and steps', () => {
    expect(messages({ name: ' ', steps: [] })).toEqual([
      'workflow name is required',
      'workflow must have at least one step',
    ]);
  });

  it('should report empty and duplicate ids with their field', () => {
    const errors = DefinitionValidator.validate(
      workflow([transform('a'), transform('a'), transform('')])
    );
    expect(errors.map((error) => `${error.field}: ${error.message}`)).toEqual([
      'steps.a: duplicate step ID: a',
      'steps[2].id: step ID is required',
    ]);
  });

  it('should allow the same id in different scopes', () => {
    const definition = workflow([
      transform('a'),
      { id: 'group', type: 'parallel', steps: [transform('a')] },
    ]);
    expect(messages(definition)).toEqual([]);
  });

  describe('kind contracts', () => {
    it('should require model and prompt for llm steps', () => {
      expect(messages(workflow([{ id: 'ask', type: 'llm', model: 'small' }]))).toEqual([
        'prompt is required for llm steps',
      ]);
    });

    it('should check builtin references', () => {
      const definition = workflow([
        { id: 'a', type: 'builtin', builtin: 'ftp.get' },
        { id: 'b', type: 'builtin', builtin: 'shell' },
      ]);
      expect(messages(definition)).toEqual([
        'invalid builtin connector: ftp (must be shell, file, http, or transform)',
        "builtin must be in format 'builtin_name.operation_name'",
      ]);
    });

    it('should resolve integration references against connectors', () => {
      const definition = workflow(
        [
          { id: 'a', type: 'integration', integration: 'api.get_user' },
          { id: 'b', type: 'integration', integration: 'api.delete_user' },
          { id: 'c', type: 'integration', integration: 'missing.op' },
          { id: 'd', type: 'integration', integration: 'nodot' },
          { id: 'e', type: 'integration', integration: 'packaged.anything' },
        ],
        { connectors: { api: apiConnector, packaged: { from: 'connectors/github' } } }
      );
      expect(messages(definition)).toEqual([
        'undefined operation delete_user in integration api',
        'references undefined integration: missing',
        "integration must be in format 'integration_name.operation_name'",
      ]);
    });

    it('should require until or max_iterations on loops', () => {
      const definition = workflow([
        { id: 'forever', type: 'loop', steps: [transform('body')] },
        { id: 'zero', type: 'loop', max_iterations: 0, steps: [transform('body')] },
        { id: 'bounded', type: 'loop', max_iterations: 100, steps: [transform('body')] },
      ]);
      expect(messages(definition)).toEqual([
        'loop step requires until or max_iterations',
        'max_iterations must be between 1 and 100',
      ]);
    });

    it('should reject nested loops', () => {
      const definition = workflow([
        {
          id: 'outer',
          type: 'loop',
          until: '{{.done}}',
          steps: [{ id: 'inner', type: 'loop', max_iterations: 2, steps: [transform('body')] }],
        },
      ]);
      expect(messages(definition)).toEqual(['nested loops are not supported']);
    });

    it('should reject reserved keys in transform inputs', () => {
      const definition = workflow([
        { id: 'shape', type: 'transform', inputs: { text: 'x', count: 1, error: 'y' } },
      ]);
      expect(messages(definition)).toEqual([
        '"text" is a reserved output key',
        '"error" is a reserved output key',
      ]);
    });

    it('should reject subworkflow steps without a path', () => {
      expect(messages(workflow([{ id: 'child', type: 'subworkflow' }]))).toEqual([
        'workflow path is required for subworkflow steps',
      ]);
    });
  });

  describe('nesting bounds', () => {
    it('should accept parallel nesting up to three levels', () => {
      expect(messages(workflow([nestedParallel(3)]))).toEqual([]);
    });

    it('should reject a fourth parallel level once', () => {
      const errors = DefinitionValidator.validate(workflow([nestedParallel(5)]));
      expect(errors.map((error) => error.field)).toEqual(['steps.p1.steps.p2.steps.p3.steps.p4']);
      expect(errors[0].message).toBe('parallel nesting depth exceeds maximum of 3');
    });

    it('should count parallel depth across loops', () => {
      const definition = workflow([
        {
          id: 'retrying',
          type: 'loop',
          max_iterations: 3,
          steps: [{ id: 'outer', type: 'parallel', steps: [nestedParallel(3)] }],
        },
      ]);
      expect(messages(definition)).toEqual(['parallel nesting depth exceeds maximum of 3']);
    });

    it('should reject nested foreach', () => {
      const definition = workflow([
        {
          id: 'outer',
          type: 'parallel',
          foreach: '{{.xs}}',
          steps: [
            { id: 'inner', type: 'parallel', foreach: '{{.ys}}', steps: [transform('leaf')] },
          ],
        },
      ]);
      const errors = DefinitionValidator.validate(definition);
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toContain('nested foreach');
      expect(errors[0].field).toBe('steps.outer.steps.inner.foreach');
    });
  });

  describe('limits', () => {
    it('should accept 10000 literal foreach elements and reject 10001', () => {
      const ok = workflow([transform('each', { foreach: Array.from({ length: 10_000 }, () => 1) })]);
      const tooMany = workflow([transform('each', { foreach: Array.from({ length: 10_001 }, () => 1) })]);
      expect(messages(ok)).toEqual([]);
      expect(messages(tooMany)).toEqual(['foreach array exceeds maximum of 10000 elements']);
    });

    it('should bound max_concurrency to [0, 100]', () => {
      const steps = (value: number): Definition =>
        workflow([{ id: 'p', type: 'parallel', max_concurrency: value, steps: [transform('a')] }]);
      expect(messages(steps(0))).toEqual([]);
      expect(messages(steps(100))).toEqual([]);
      expect(messages(steps(101))).toEqual(['max_concurrency must be between 0 and 100']);
      expect(messages(steps(-1))).toEqual(['max_concurrency must be between 0 and 100']);
    });

    it('should reject template expressions in expr inputs', () => {
      const definition = workflow([
        { id: 'q', type: 'builtin', builtin: 'transform.jq', inputs: { expr: '.items[{{.i}}]' } },
        { id: 'r', type: 'builtin', builtin: 'transform.jq', inputs: { expr: '.items[$i]' } },
      ]);
      expect(messages(definition)).toEqual(['expr must not contain template expressions']);
    });
  });

  describe('policies', () => {
    it('should check retry and on_error shapes', () => {
      const definition = workflow([
        transform('a', { retry: { max_attempts: 0, backoff_multiplier: 0.5 } }),
        transform('b', { retry: { backoff_base: 'soon' } }),
        transform('c', { on_error: { strategy: 'fallback' } }),
        transform('d', { on_error: { strategy: 'fallback', fallback_step: 'nowhere' } }),
        transform('e', { on_error: { strategy: 'fallback', fallback_step: 'a' } }),
      ]);
      expect(messages(definition)).toEqual([
        'max_attempts must be at least 1',
        'backoff_multiplier must be at least 1.0',
        'invalid duration "soon": use units ms, s, m or h (e.g. "30s")',
        "fallback_step or value is required when error strategy is 'fallback'",
        'fallback_step references undefined step: nowhere',
      ]);
    });
  });

  describe('connectors', () => {
    const withConnector = (connector: Connector): Definition =>
      workflow([transform('a')], { connectors: { api: connector } });

    it('should accept a bearer token without an explicit type', () => {
      expect(messages(withConnector(apiConnector))).toEqual([]);
    });

    it('should check auth requirements per type', () => {
      expect(messages(withConnector({ ...apiConnector, auth: { type: 'basic', username: 'u' } }))).toEqual([
        'password is required for basic auth',
      ]);
      expect(messages(withConnector({ ...apiConnector, auth: { type: 'api_key' } }))).toEqual([
        'header is required for api_key auth',
        'value is required for api_key auth',
      ]);
      expect(messages(withConnector({ ...apiConnector, auth: { type: 'digest' } }))).toEqual([
        'invalid auth type: digest (must be bearer, basic, api_key, or oauth2_client)',
      ]);
    });

    it('should reject oauth2_client as not yet implemented', () => {
      const auth = { type: 'oauth2_client', client_id: 'id', token_url: 'https://auth.example.test' };
      expect(messages(withConnector({ ...apiConnector, auth }))).toEqual([
        'oauth2_client auth type is not yet implemented',
      ]);
    });

    it('should check rate limits and operations', () => {
      const connector: Connector = {
        base_url: 'https://api.example.test',
        auth: { token: '${API_TOKEN}' },
        rate_limit: { burst: -1 },
        operations: { fetch: { method: 'FETCH', path: '' } },
      };
      expect(messages(withConnector(connector))).toEqual([
        'at least one of requests_per_second or requests_per_minute must be specified',
        'burst must be non-negative',
        'invalid method: FETCH (must be GET, POST, PUT, PATCH, DELETE, or HEAD)',
        'path is required',
      ]);
    });

    it('should keep from and inline definitions exclusive', () => {
      expect(messages(withConnector({ from: 'connectors/github', base_url: 'https://x.test' }))).toEqual([
        "connector cannot specify both 'from' (package import) and inline definition (base_url/operations)",
      ]);
    });
  });

  describe('triggers', () => {
    const withListen = (listen: Definition['listen']): Definition =>
      workflow([transform('a')], { listen });

    it('should require exactly one trigger type', () => {
      expect(messages(withListen({}))).toEqual(['at least one trigger type must be configured']);
      expect(messages(withListen({ api: {}, schedule: { cron: '0 * * * *' } }))).toEqual([
        'only one trigger type can be configured per workflow',
      ]);
    });

    it('should check poll rules', () => {
      const definition = withListen({
        poll: {
          integration: 'github',
          query: { assignee: 'me@example.test', status: 'open; drop' },
          interval: '5s',
          startup: 'backfill',
          backfill: '48h',
        },
      });
      expect(messages(definition)).toEqual([
        'unsupported integration: github',
        'interval must be at least 10s, got: 5s',
        'backfill duration cannot exceed 24h, got: 48h',
        'invalid query parameter value',
      ]);
    });

    it('should accept a valid poll trigger', () => {
      const definition = withListen({
        poll: { integration: 'jira', query: { project: 'OPS' }, interval: '1m', startup: 'since_last' },
      });
      expect(messages(definition)).toEqual([]);
    });
  });
});
