import { describe, expect, it } from 'vitest';
import type { EnvConfig } from '@/core/env';
import {
  FallbackStrategyOracle,
  LlmStrategyOracle,
  TemplateStrategyOracle,
  createStrategyOracle,
  type FetchLike,
} from '@/llm/adapter';
import { extractStrategyCode } from '@/llm/guardrails';
import type { DailyProposalContext, StrategyOracle } from '@/llm/oracle';
import {
  buildDailyPrompt,
  generateTemplateStrategy,
  renderLinearStrategy,
} from '@/llm/templates';
import { validateStrategyCode } from '@/strategy/validator';

const STRATEGY = 'function scoreAsset(r24, r6, vol, s) {\n  return r24 + { a: 1 }.a;\n}';

const dailyContext: DailyProposalContext = {
  date: '2024-03-13',
  chosenAsset: 'AAA',
  actualReturn: -1.25,
  rank: 3,
  universeSize: 3,
  realizedReturns: [
    { asset: 'CCC', realizedReturn: 3 },
    { asset: 'BBB', realizedReturn: 2 },
    { asset: 'AAA', realizedReturn: -1.25 },
  ],
  headlines: 'AAA slides',
  activeCode: STRATEGY,
  activeVersion: 2,
};

function env(overrides: Partial<EnvConfig> = {}): EnvConfig {
  return {
    enableLlm: false,
    llmApiKey: null,
    llmBaseUrl: 'http://localhost:9/v1',
    llmModel: 'test-model',
    dbPath: ':memory:',
    logLevel: 'silent',
    nodeEnv: 'test',
    ...overrides,
  };
}

function completion(content: string, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status });
}

describe('extractStrategyCode', () => {
  it('takes the declaration from a fenced block', () => {
    const text = `Here is a better one:\n\`\`\`javascript\n${STRATEGY}\n\`\`\`\nGood luck.`;
    expect(extractStrategyCode(text)).toBe(STRATEGY);
  });

  it('falls back to a bare declaration with nested braces', () => {
    expect(extractStrategyCode(`Try this: ${STRATEGY} and see.`)).toBe(STRATEGY);
  });

  it('returns null when there is no declaration', () => {
    expect(extractStrategyCode('I would weight momentum more.')).toBeNull();
  });
});

describe('templates', () => {
  it('renders a linear strategy that passes shape checks', () => {
    const code = renderLinearStrategy({ return24h: 0.5, return6h: -0.25, volume: 2, sentiment: 3 });
    expect(code).toContain('return24h * 0.500 + return6h * (-0.250)');
    expect(validateStrategyCode(code).valid).toBe(true);
  });

  it('generates the same candidate for the same date and cycle', () => {
    const first = generateTemplateStrategy('2024-03-13', 'daily');
    expect(generateTemplateStrategy('2024-03-13', 'daily')).toBe(first);
    expect(generateTemplateStrategy('2024-03-13', 'long_term')).not.toBe(first);
    expect(validateStrategyCode(first).valid).toBe(true);
  });

  it('puts the day outcome and active code into the daily prompt', () => {
    const prompt = buildDailyPrompt(dailyContext);
    expect(prompt).toContain('bought AAA, which returned -1.25% and ranked 3 of 3');
    expect(prompt).toContain('  CCC: +3.00%');
    expect(prompt).toContain('Current strategy (version 2):');
  });
});

describe('LlmStrategyOracle', () => {
  it('posts a chat completion and extracts the strategy', async () => {
    const calls: Array<{ url: string; init: RequestInit }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      calls.push({ url, init });
      return completion(`\`\`\`js\n${STRATEGY}\n\`\`\``);
    };
    const oracle = new LlmStrategyOracle({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:9/v1/',
      model: 'test-model',
      fetchImpl,
    });

    expect(await oracle.proposeDaily(dailyContext)).toBe(STRATEGY);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://localhost:9/v1/chat/completions');
    expect(calls[0].init.method).toBe('POST');
  });

  it('retries server errors with backoff', async () => {
    let attempts = 0;
    const fetchImpl: FetchLike = async () => {
      attempts++;
      return attempts < 3 ? new Response('busy', { status: 503 }) : completion(STRATEGY);
    };
    const oracle = new LlmStrategyOracle({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:9/v1',
      model: 'test-model',
      initialBackoffMs: 0,
      fetchImpl,
    });

    expect(await oracle.proposeDaily(dailyContext)).toBe(STRATEGY);
    expect(attempts).toBe(3);
  });

  it('does not retry client errors', async () => {
    let attempts = 0;
    const fetchImpl: FetchLike = async () => {
      attempts++;
      return new Response('bad key', { status: 401 });
    };
    const oracle = new LlmStrategyOracle({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:9/v1',
      model: 'test-model',
      initialBackoffMs: 0,
      fetchImpl,
    });

    await expect(oracle.proposeDaily(dailyContext)).rejects.toThrow('LLM API error: 401');
    expect(attempts).toBe(1);
  });

  it('returns null when the reply has no strategy', async () => {
    const oracle = new LlmStrategyOracle({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:9/v1',
      model: 'test-model',
      fetchImpl: async () => completion('No idea.'),
    });
    expect(await oracle.proposeDaily(dailyContext)).toBeNull();
  });
});

describe('oracle selection', () => {
  it('falls back when the primary oracle fails', async () => {
    const broken: StrategyOracle = {
      name: 'broken',
      proposeDaily: async () => {
        throw new Error('down');
      },
      proposeLongTerm: async () => null,
    };
    const oracle = new FallbackStrategyOracle(broken, new TemplateStrategyOracle());

    expect(oracle.name).toBe('broken+template');
    expect(await oracle.proposeDaily(dailyContext)).toBe(
      generateTemplateStrategy('2024-03-13', 'daily')
    );
  });

  it('uses templates when the LLM is disabled', () => {
    expect(createStrategyOracle(env()).name).toBe('template');
  });

  it('wraps the LLM with a template fallback when enabled', () => {
    const oracle = createStrategyOracle(env({ enableLlm: true, llmApiKey: 'test-secret' }));
    expect(oracle.name).toBe('llm+template');
  });
});
