/**
 * Prompt templates for strategy proposals, plus a deterministic template
 * generator used when no language model is configured.
 */

import { deterministicSeed, seededRandom } from '@/core/seed';
import type { DailyProposalContext, LongTermProposalContext } from './oracle';

const SIGNATURE = 'function scoreAsset(return24h, return6h, volumeRatio, newsSentiment)';

const RULES = [
  `Reply with exactly one JavaScript function declaration: ${SIGNATURE} { ... }`,
  'It must return a finite number; higher means more likely to outperform over the next 24 hours.',
  'return24h and return6h are percent changes, volumeRatio is current over average volume, newsSentiment is in [-1, 1].',
  'Use only arithmetic and Math. No other functions, no globals, no imports, no loops over external data.',
  'Wrap the function in a ```javascript fenced block and add nothing else.',
].join('\n');

function formatPct(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

export function buildDailyPrompt(context: DailyProposalContext): string {
  const returns = context.realizedReturns
    .map((r) => `  ${r.asset}: ${formatPct(r.realizedReturn)}`)
    .join('\n');

  return [
    `You tune a daily crypto asset picker. Date: ${context.date}.`,
    `Yesterday the strategy bought ${context.chosenAsset}, which returned ${formatPct(
      context.actualReturn
    )} and ranked ${context.rank} of ${context.universeSize}.`,
    '',
    'Realized 24h returns, best first:',
    returns,
    '',
    'Headlines for the chosen asset:',
    context.headlines || '  (none)',
    '',
    `Current strategy (version ${context.activeVersion}):`,
    context.activeCode,
    '',
    'Propose an improved strategy that ranks the universe closer to the realized order.',
    RULES,
  ].join('\n');
}

export function buildLongTermPrompt(context: LongTermProposalContext): string {
  const { performance } = context;
  const outcomes = context.recentOutcomes
    .map((o) => `  ${o.date} ${o.chosenAsset} ${formatPct(o.actualReturn)} rank ${o.rank}`)
    .join('\n');

  return [
    `You review a daily crypto asset picker over its recent history. Date: ${context.date}.`,
    `Trades: ${performance.totalTrades}, average return ${formatPct(performance.avgReturn)}, ` +
      `Sharpe ${performance.sharpeRatio.toFixed(3)}, win rate ${(performance.winRate * 100).toFixed(
        1
      )}%, average rank ${performance.avgRank.toFixed(2)} of ${context.universeSize}.`,
    '',
    'Recent picks:',
    outcomes || '  (none)',
    '',
    `Current strategy (version ${context.activeVersion}):`,
    context.activeCode,
    '',
    'Propose a strategy that maximizes risk-adjusted return over the long run, not just the last day.',
    RULES,
  ].join('\n');
}

export interface TemplateWeights {
  return24h: number;
  return6h: number;
  volume: number;
  sentiment: number;
}

function weight(value: number): string {
  return value < 0 ? `(${value.toFixed(3)})` : value.toFixed(3);
}

export function renderLinearStrategy(weights: TemplateWeights): string {
  return [
    `${SIGNATURE} {`,
    `  const momentum = return24h * ${weight(weights.return24h)} + return6h * ${weight(
      weights.return6h
    )};`,
    `  const volume = (volumeRatio - 1) * ${weight(weights.volume)};`,
    `  return momentum + volume + newsSentiment * ${weight(weights.sentiment)};`,
    '}',
  ].join('\n');
}

/**
 * Seeded linear weights for a date and cycle kind. Same inputs, same code.
 */
export function generateTemplateWeights(date: string, salt: string): TemplateWeights {
  const next = seededRandom(deterministicSeed(date, salt));
  const between = (lo: number, hi: number) => lo + (hi - lo) * next();
  return {
    return24h: between(-1, 1),
    return6h: between(-1, 1),
    volume: between(0, 4),
    sentiment: between(0, 5),
  };
}

export function generateTemplateStrategy(date: string, salt: string): string {
  return renderLinearStrategy(generateTemplateWeights(date, salt));
}
