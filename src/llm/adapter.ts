/**
 * LLM Adapter
 * Feature-flagged strategy oracle with fallback to seeded templates
 */

import { getEnvConfig, type EnvConfig } from '@/core/env';
import { toError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { extractStrategyCode } from './guardrails';
import type { DailyProposalContext, LongTermProposalContext, StrategyOracle } from './oracle';
import { buildDailyPrompt, buildLongTermPrompt, generateTemplateStrategy } from './templates';

const logger = createChildLogger('llm_adapter');

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface LlmOracleConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature?: number;
  maxRetries?: number;
  initialBackoffMs?: number;
  fetchImpl?: FetchLike;
}

interface ChatCompletion {
  choices: Array<{ message: { content: string } }>;
}

function isChatCompletion(value: unknown): value is ChatCompletion {
  if (typeof value !== 'object' || value === null || !('choices' in value)) return false;
  const { choices } = value;
  if (!Array.isArray(choices) || choices.length === 0) return false;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return false;
  const { message } = first;
  return (
    typeof message === 'object' &&
    message !== null &&
    'content' in message &&
    typeof message.content === 'string'
  );
}

/**
 * Talks to an OpenAI-compatible /chat/completions endpoint.
 */
export class LlmStrategyOracle implements StrategyOracle {
  readonly name = 'llm';
  private readonly fetchImpl: FetchLike;
  private requestCount = 0;

  constructor(private readonly config: LlmOracleConfig) {
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async proposeDaily(context: DailyProposalContext): Promise<string | null> {
    return this.propose(buildDailyPrompt(context), 'daily');
  }

  async proposeLongTerm(context: LongTermProposalContext): Promise<string | null> {
    return this.propose(buildLongTermPrompt(context), 'long_term');
  }

  private async propose(prompt: string, cycle: string): Promise<string | null> {
    logger.info({ model: this.config.model, cycle }, 'Requesting strategy proposal');
    const text = await this.completeWithRetry(prompt);
    const code = extractStrategyCode(text);
    if (!code) {
      logger.warn({ cycle }, 'LLM response contained no strategy');
    }
    return code;
  }

  private async completeWithRetry(prompt: string): Promise<string> {
    const { maxRetries = 3, initialBackoffMs = 1000 } = this.config;
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const body = JSON.stringify({
      model: this.config.model,
      temperature: this.config.temperature ?? 0.7,
      messages: [{ role: 'user', content: prompt }],
    });

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.fetchImpl(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body,
        });
        this.requestCount++;

        if (response.status === 429 || response.status >= 500) {
          throw new Error(`LLM API error: ${response.status} ${response.statusText}`);
        }
        if (!response.ok) {
          // Client errors will not improve on retry
          lastError = new Error(`LLM API error: ${response.status} ${response.statusText}`);
          break;
        }

        const data: unknown = await response.json();
        if (!isChatCompletion(data)) {
          throw new Error('LLM API returned an unexpected payload');
        }
        return data.choices[0].message.content;
      } catch (error) {
        lastError = toError(error);

        if (attempt < maxRetries) {
          const backoffMs = initialBackoffMs * Math.pow(2, attempt);
          logger.warn(
            { attempt, backoffMs, error: lastError.message },
            'LLM request failed, retrying'
          );
          await this.sleep(backoffMs);
        }
      }
    }

    throw lastError ?? new Error('LLM request failed after retries');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Offline oracle: seeded linear strategies, reproducible per date.
 */
export class TemplateStrategyOracle implements StrategyOracle {
  readonly name = 'template';

  async proposeDaily(context: DailyProposalContext): Promise<string | null> {
    return generateTemplateStrategy(context.date, 'daily');
  }

  async proposeLongTerm(context: LongTermProposalContext): Promise<string | null> {
    return generateTemplateStrategy(context.date, 'long_term');
  }
}

/**
 * Uses `primary`, and `fallback` whenever the primary fails or proposes nothing.
 */
export class FallbackStrategyOracle implements StrategyOracle {
  readonly name: string;

  constructor(
    private readonly primary: StrategyOracle,
    private readonly fallback: StrategyOracle
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async proposeDaily(context: DailyProposalContext): Promise<string | null> {
    return this.withFallback('daily', () => this.primary.proposeDaily(context), () =>
      this.fallback.proposeDaily(context)
    );
  }

  async proposeLongTerm(context: LongTermProposalContext): Promise<string | null> {
    return this.withFallback('long_term', () => this.primary.proposeLongTerm(context), () =>
      this.fallback.proposeLongTerm(context)
    );
  }

  private async withFallback(
    cycle: string,
    primary: () => Promise<string | null>,
    fallback: () => Promise<string | null>
  ): Promise<string | null> {
    try {
      const proposal = await primary();
      if (proposal !== null) return proposal;
      logger.info({ cycle, oracle: this.primary.name }, 'No proposal, using fallback oracle');
    } catch (error) {
      logger.error(
        { cycle, oracle: this.primary.name, error: toError(error).message },
        'Oracle failed, using fallback oracle'
      );
    }
    return fallback();
  }
}

export function isLlmEnabled(env: EnvConfig = getEnvConfig()): boolean {
  return env.enableLlm && env.llmApiKey !== null;
}

export function createStrategyOracle(env: EnvConfig = getEnvConfig()): StrategyOracle {
  const templates = new TemplateStrategyOracle();
  if (!isLlmEnabled(env) || env.llmApiKey === null) {
    logger.info('LLM disabled, using template oracle');
    return templates;
  }

  const llm = new LlmStrategyOracle({
    apiKey: env.llmApiKey,
    baseUrl: env.llmBaseUrl,
    model: env.llmModel,
  });
  return new FallbackStrategyOracle(llm, templates);
}
