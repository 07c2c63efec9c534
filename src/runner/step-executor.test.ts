import { describe, expect, it } from 'vitest';
import type { StepDefinition } from '../parser/schema.ts';
import { StepError, StepTimeoutError } from '../types/errors.ts';
import { connectorOutput } from './executors/connector-executor.ts';
import { resolveConcurrency } from './executors/fan-out.ts';
import { StepExecutor, effectiveKind } from './step-executor.ts';
import { CapturingLogger, MockConnectorRegistry, MockLLMProvider, delay } from './test-harness.ts';
import { WorkflowContext } from './workflow-context.ts';

const signal = new AbortController().signal;

function step(fields: Partial<StepDefinition> & Pick<StepDefinition, 'id' | 'type'>): StepDefinition {
  return fields;
}

async function captureStepError(pending: Promise<unknown>): Promise<StepError> {
  try {
    await pending;
  } catch (error) {
    if (error instanceof StepError) return error;
    throw error;
  }
  throw new Error('expected the step to fail');
}

describe('StepExecutor', () => {
  it('should record the output of a successful step', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry({ 'api.echo': (inputs) => inputs }),
      logger: new CapturingLogger(),
    });
    const context = new WorkflowContext({ city: 'Lisbon' });

    const output = await executor.execute(
      step({ id: 'echo', type: 'connector', connector: 'api.echo', inputs: { q: '{{.city}}' } }),
      context,
      signal
    );

    expect(output.status).toBe('success');
    expect(output.data).toEqual({ q: 'Lisbon', response: { q: 'Lisbon' } });
    expect(output.metadata.attempts).toBe(1);
    expect(context.getOutput('echo')).toBe(output);
  });

  it('should log progress lines', async () => {
    const logger = new CapturingLogger();
    const executor = new StepExecutor({ connectors: new MockConnectorRegistry(), logger });

    await executor.execute(
      step({ id: 'fmt', type: 'transform', template: 'x' }),
      new WorkflowContext(),
      signal
    );

    expect(logger.lines[0]).toBe('▶ Executing step fmt (transform)');
    expect(logger.lines[1]).toMatch(/^✓ Step fmt completed \(\d+ms\)$/);
  });

  it('should fail a leaf attempt that outlives its timeout', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry({
        'api.slow': async (_inputs, attemptSignal) => {
          await delay(1_000, attemptSignal);
          return 'late';
        },
      }),
      logger: new CapturingLogger(),
    });

    const error = await captureStepError(
      executor.execute(
        step({ id: 'slow', type: 'connector', connector: 'api.slow', timeout: '20ms' }),
        new WorkflowContext(),
        signal
      )
    );

    expect(error.cause).toBeInstanceOf(StepTimeoutError);
    expect(error.message).toBe('step "slow" (connector) failed: step "slow" timed out after 20ms');
    expect(error.retriable).toBe(true);
  });

  it('should apply the default step timeout', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry({
        'api.slow': async (_inputs, attemptSignal) => {
          await delay(1_000, attemptSignal);
          return 'late';
        },
      }),
      logger: new CapturingLogger(),
      defaults: { stepTimeoutMs: 15 },
    });

    const error = await captureStepError(
      executor.execute(
        step({ id: 'slow', type: 'connector', connector: 'api.slow' }),
        new WorkflowContext(),
        signal
      )
    );
    expect(error.cause.message).toBe('step "slow" timed out after 15ms');
  });

  it('should run a step whose when condition cannot be evaluated', async () => {
    const logger = new CapturingLogger();
    const executor = new StepExecutor({ connectors: new MockConnectorRegistry(), logger });

    const output = await executor.execute(
      step({ id: 'fmt', type: 'transform', template: 'ran', when: 'div 1 0' }),
      new WorkflowContext(),
      signal
    );

    expect(output.text).toBe('ran');
    expect(logger.entries.filter((entry) => entry.level === 'warn')).toHaveLength(1);
  });

  it('should fail a fallback whose source step has no output', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry({
        'api.broken': () => {
          throw new Error('boom');
        },
      }),
      logger: new CapturingLogger(),
    });

    const error = await captureStepError(
      executor.execute(
        step({
          id: 'primary',
          type: 'connector',
          connector: 'api.broken',
          on_error: { strategy: 'fallback', fallback_step: 'cached' },
        }),
        new WorkflowContext(),
        signal
      )
    );

    expect(error.stepId).toBe('primary');
    expect(error.cause.message).toBe('fallback step "cached" has no successful output (after: boom)');
  });

  it('should fail a transform whose template does not render', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry(),
      logger: new CapturingLogger(),
    });

    const error = await captureStepError(
      executor.execute(
        step({ id: 'math', type: 'transform', template: '{{div 4 0}}' }),
        new WorkflowContext(),
        signal
      )
    );
    expect(error.kind).toBe('transform');
  });

  it('should expose resolved transform inputs to the template', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry(),
      logger: new CapturingLogger(),
    });

    const output = await executor.execute(
      step({
        id: 'fmt',
        type: 'transform',
        inputs: { count: '{{.n}}' },
        template: 'count={{.count}}',
      }),
      new WorkflowContext({ n: 3 }),
      signal
    );

    expect(output.text).toBe('count=3');
    expect(output.data).toEqual({ count: 3 });
  });

  it('should require an LLM provider for llm steps', async () => {
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry(),
      logger: new CapturingLogger(),
    });

    const error = await captureStepError(
      executor.execute(
        step({ id: 'ask', type: 'llm', model: 'm', prompt: 'hi' }),
        new WorkflowContext(),
        signal
      )
    );
    expect(error.cause.message).toBe('no LLM provider configured for step "ask"');
  });

  it('should pass system text and token limits to the provider', async () => {
    const llm = new MockLLMProvider(() => ({
      text: 'ok',
      usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
    }));
    const executor = new StepExecutor({
      connectors: new MockConnectorRegistry(),
      llm,
      logger: new CapturingLogger(),
    });

    const output = await executor.execute(
      step({ id: 'ask', type: 'llm', model: 'm-{{.tier}}', prompt: 'hi', system: 'be brief', max_tokens: 10 }),
      new WorkflowContext({ tier: 'small' }),
      signal
    );

    expect(output.metadata.model).toBe('m-small');
    expect(output.metadata.token_usage).toEqual({ prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 });
  });

  it('should not start a step under an aborted signal', async () => {
    const connectors = new MockConnectorRegistry({ 'api.echo': () => 'x' });
    const executor = new StepExecutor({ connectors, logger: new CapturingLogger() });
    const controller = new AbortController();
    controller.abort();

    const error = await captureStepError(
      executor.execute(
        step({ id: 'echo', type: 'connector', connector: 'api.echo' }),
        new WorkflowContext(),
        controller.signal
      )
    );
    expect(error.cancelled).toBe(true);
    expect(connectors.calls).toHaveLength(0);
  });
});

describe('effectiveKind', () => {
  it('should route any step with foreach through the foreach driver', () => {
    expect(effectiveKind(step({ id: 'a', type: 'transform', foreach: '{{.xs}}' }))).toBe('foreach');
    expect(effectiveKind(step({ id: 'a', type: 'transform' }))).toBe('transform');
  });
});

describe('resolveConcurrency', () => {
  it('should honor an explicit limit', () => {
    expect(resolveConcurrency(3, 10)).toBe(3);
  });

  it('should fall back to the configured default when zero', () => {
    expect(resolveConcurrency(0, 50, 7)).toBe(7);
  });

  it('should never exceed the child count by default', () => {
    expect(resolveConcurrency(undefined, 1)).toBe(1);
    expect(resolveConcurrency(undefined, 0)).toBe(1);
  });
});

describe('connectorOutput', () => {
  it('should use a string response as text and content', () => {
    const output = connectorOutput({ response: 'hello', statusCode: 200 });
    expect(output.text).toBe('hello');
    expect(output.data).toEqual({ response: 'hello', status_code: 200, content: 'hello' });
  });

  it('should flatten mapping responses into the data', () => {
    const output = connectorOutput({ response: { id: 7 } });
    expect(output.text).toBe('');
    expect(output.data).toEqual({ id: 7, response: { id: 7 } });
  });
});
