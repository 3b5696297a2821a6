/**
 * Improvement Controller
 *
 * Runs the daily and long-term improvement cycles: ask the oracle for a
 * candidate, shape-check it, backtest candidate and active strategy over the
 * same window and promote only on a measurable gain. Also restores archived
 * versions (rollback) by appending them as new versions.
 */

import { backtestRecords, type BacktestMetrics } from '@/backtesting/engine';
import { mean, sharpeRatio, winRate } from '@/backtesting/stats';
import { getConfig, type AppConfig, type LongTermConfig } from '@/core/config';
import { toError } from '@/core/errors';
import { strategyCodeHash } from '@/core/seed';
import { daysBetween, previousDateKey } from '@/core/time';
import {
  appendModelVersion,
  getActiveModelVersion,
  requireVersion,
} from '@/data/repositories/model_version_repo';
import {
  countResolved,
  getTradeRecord,
  isResolved,
  queryResolved,
} from '@/data/repositories/trade_repo';
import type { DailyProposalContext, LongTermProposalContext, StrategyOracle } from '@/llm/oracle';
import { sortDescending } from '@/scoring/ranking';
import { BASELINE_STRATEGY_CODE, BASELINE_VERSION } from '@/strategy/baseline';
import { loadStrategy, loadStrategyOrNeutral } from '@/strategy/loader';
import type { ScoringStrategy } from '@/strategy/types';
import { validateStrategyCode } from '@/strategy/validator';
import type { ImprovementType, ModelVersion, ResolvedTradeRecord } from '@/types/signal';
import { createChildLogger } from '@/utils/logger';
import { evaluatePromotion, type PromotionEvaluation } from './promotion';

const logger = createChildLogger('improvement');

const RECENT_OUTCOMES_IN_PROMPT = 10;

export type CycleKind = 'daily' | 'long_term';

export type SkipReason =
  | 'no_resolved_record'
  | 'no_candidate'
  | 'invalid_candidate'
  | 'insufficient_data'
  | 'not_due'
  | 'duplicate_candidate';

interface DecisionBase {
  cycle: CycleKind;
  date: string;
}

export interface PromotedDecision extends DecisionBase {
  outcome: 'promoted';
  version: ModelVersion;
  candidate: BacktestMetrics;
  /** Null on cold start, when there was no active strategy to compare against. */
  active: BacktestMetrics | null;
  evaluation: PromotionEvaluation | null;
}

export interface RejectedDecision extends DecisionBase {
  outcome: 'rejected';
  candidate: BacktestMetrics;
  active: BacktestMetrics;
  evaluation: PromotionEvaluation;
}

export interface SkippedDecision extends DecisionBase {
  outcome: 'skipped';
  reason: SkipReason;
  detail?: string;
}

export type ImprovementDecision = PromotedDecision | RejectedDecision | SkippedDecision;

export type RollbackResult =
  | { status: 'rolled_back'; version: ModelVersion; previousActive: number | null }
  | { status: 'already_active'; version: ModelVersion };

export interface ImprovementControllerDeps {
  oracle: StrategyOracle;
  config?: AppConfig;
  universe?: readonly string[];
}

export function isLongTermDue(date: string, longTerm: LongTermConfig): boolean {
  const elapsed = daysBetween(longTerm.epoch, date);
  return elapsed >= 0 && elapsed % longTerm.periodDays === 0;
}

export class ImprovementController {
  private readonly oracle: StrategyOracle;
  private readonly config: AppConfig;
  private readonly universe: readonly string[];

  constructor(deps: ImprovementControllerDeps) {
    this.oracle = deps.oracle;
    this.config = deps.config ?? getConfig();
    this.universe = deps.universe ?? this.config.universe.symbols;
  }

  /**
   * Daily cycle for `date`, driven by the resolved record of the day before.
   */
  async runDailyCycle(date: string): Promise<ImprovementDecision> {
    const yesterday = previousDateKey(date);
    const record = getTradeRecord(yesterday);
    if (!record || !isResolved(record)) {
      return this.skip('daily', date, 'no_resolved_record', `no resolved record for ${yesterday}`);
    }

    const active = getActiveModelVersion();
    const context: DailyProposalContext = {
      date,
      chosenAsset: record.chosenAsset,
      actualReturn: record.actualReturnOfChosen,
      rank: record.rankOfChosen,
      universeSize: this.universe.length,
      realizedReturns: sortDescending(
        record.assets.map((a) => ({ asset: a.asset, position: a.position, value: a.realizedReturn24h }))
      ).map((a) => ({ asset: a.asset, realizedReturn: a.value })),
      headlines: record.newsHeadlines ?? '',
      activeCode: active?.strategyCode ?? BASELINE_STRATEGY_CODE,
      activeVersion: active?.version ?? BASELINE_VERSION,
    };

    const proposal = await this.requestProposal('daily', date, () =>
      this.oracle.proposeDaily(context)
    );
    if (proposal === null) {
      return this.skip('daily', date, 'no_candidate');
    }

    return this.evaluateCandidate(
      'daily',
      date,
      proposal,
      active,
      this.config.engine.backtest.lookbackRecords
    );
  }

  /**
   * Long-term cycle; runs only on period boundaries unless forced, and only
   * with enough resolved history.
   */
  async runLongTermCycle(
    date: string,
    options: { force?: boolean } = {}
  ): Promise<ImprovementDecision> {
    const longTerm = this.config.engine.longTerm;
    if (!options.force && !isLongTermDue(date, longTerm)) {
      return this.skip('long_term', date, 'not_due');
    }

    const resolved = countResolved();
    if (resolved < longTerm.minResolvedRecords) {
      return this.skip(
        'long_term',
        date,
        'insufficient_data',
        `${resolved} resolved records, need ${longTerm.minResolvedRecords}`
      );
    }

    const history = queryResolved({ limit: longTerm.lookbackRecords });
    const returns = history.map((r) => r.actualReturnOfChosen);
    const active = getActiveModelVersion();

    const context: LongTermProposalContext = {
      date,
      universeSize: this.universe.length,
      activeCode: active?.strategyCode ?? BASELINE_STRATEGY_CODE,
      activeVersion: active?.version ?? BASELINE_VERSION,
      performance: {
        totalTrades: history.length,
        avgReturn: mean(returns) ?? 0,
        sharpeRatio: sharpeRatio(returns),
        winRate: winRate(returns),
        avgRank: mean(history.map((r) => r.rankOfChosen)) ?? 0,
      },
      recentOutcomes: history.slice(0, RECENT_OUTCOMES_IN_PROMPT).map((r) => ({
        date: r.date,
        chosenAsset: r.chosenAsset,
        actualReturn: r.actualReturnOfChosen,
        rank: r.rankOfChosen,
      })),
    };

    const proposal = await this.requestProposal('long_term', date, () =>
      this.oracle.proposeLongTerm(context)
    );
    if (proposal === null) {
      return this.skip('long_term', date, 'no_candidate');
    }

    return this.evaluateCandidate('long_term', date, proposal, active, longTerm.lookbackRecords);
  }

  /**
   * Daily cycle, then the long-term cycle against whatever is active after it.
   */
  async runCycle(date: string): Promise<ImprovementDecision[]> {
    const daily = await this.runDailyCycle(date);
    const longTerm = await this.runLongTermCycle(date);
    return [daily, longTerm];
  }

  /**
   * Re-activate an archived version by appending its code as a new version.
   */
  rollbackTo(version: number): RollbackResult {
    const target = requireVersion(version);
    const current = getActiveModelVersion();

    if (current && current.codeHash === target.codeHash) {
      logger.info({ version, active: current.version }, 'Requested code is already active');
      return { status: 'already_active', version: current };
    }

    const restored = appendModelVersion({
      strategyCode: target.strategyCode,
      rankCorrelation: target.rankCorrelation,
      avgDailyReturn: target.avgDailyReturn,
      improvementType: 'rollback',
      rolledBackFrom: target.version,
    });

    logger.info(
      { restoredFrom: target.version, newVersion: restored.version, previous: current?.version },
      'Rolled back strategy'
    );
    return { status: 'rolled_back', version: restored, previousActive: current?.version ?? null };
  }

  private async requestProposal(
    cycle: CycleKind,
    date: string,
    propose: () => Promise<string | null>
  ): Promise<string | null> {
    try {
      return await propose();
    } catch (error) {
      logger.error(
        { cycle, date, oracle: this.oracle.name, error: toError(error).message },
        'Oracle failed to propose a candidate'
      );
      return null;
    }
  }

  private evaluateCandidate(
    cycle: CycleKind,
    date: string,
    proposal: string,
    active: ModelVersion | null,
    lookback: number
  ): ImprovementDecision {
    const validation = validateStrategyCode(proposal);
    if (!validation.valid) {
      return this.skip(cycle, date, 'invalid_candidate', validation.violations.join('; '));
    }

    if (active && strategyCodeHash(validation.code) === active.codeHash) {
      return this.skip(cycle, date, 'duplicate_candidate', `matches v${active.version}`);
    }

    const timeoutMs = this.config.engine.strategyTimeoutMs;
    let candidate: ScoringStrategy;
    try {
      candidate = loadStrategy(validation.code, { label: `${cycle}-candidate`, timeoutMs });
    } catch (error) {
      return this.skip(cycle, date, 'invalid_candidate', toError(error).message);
    }

    const minSamples = this.config.engine.backtest.minSamples;
    const records: ResolvedTradeRecord[] = queryResolved({ limit: lookback });
    const candidateResult = backtestRecords(candidate, records, this.universe, minSamples);
    if (candidateResult.status !== 'ok') {
      return this.skip(
        cycle,
        date,
        'insufficient_data',
        `candidate: ${candidateResult.reason} (${candidateResult.sampleCount}/${candidateResult.requiredSamples})`
      );
    }

    if (!active) {
      const version = this.promote(validation.code, candidateResult, 'initial');
      return this.log({
        cycle,
        date,
        outcome: 'promoted',
        version,
        candidate: candidateResult,
        active: null,
        evaluation: null,
      });
    }

    const activeStrategy = loadStrategyOrNeutral(active.strategyCode, {
      version: active.version,
      timeoutMs,
    });
    const activeResult = backtestRecords(activeStrategy, records, this.universe, minSamples);
    if (activeResult.status !== 'ok') {
      return this.skip(cycle, date, 'insufficient_data', `active: ${activeResult.reason}`);
    }

    const evaluation = evaluatePromotion(
      candidateResult,
      activeResult,
      this.config.engine.promotion
    );
    if (!evaluation.promote) {
      return this.log({
        cycle,
        date,
        outcome: 'rejected',
        candidate: candidateResult,
        active: activeResult,
        evaluation,
      });
    }

    const version = this.promote(validation.code, candidateResult, cycle);
    return this.log({
      cycle,
      date,
      outcome: 'promoted',
      version,
      candidate: candidateResult,
      active: activeResult,
      evaluation,
    });
  }

  private promote(
    code: string,
    metrics: BacktestMetrics,
    improvementType: ImprovementType
  ): ModelVersion {
    return appendModelVersion({
      strategyCode: code,
      rankCorrelation: metrics.rankCorrelation,
      avgDailyReturn: metrics.avgReturn,
      improvementType,
    });
  }

  private skip(
    cycle: CycleKind,
    date: string,
    reason: SkipReason,
    detail?: string
  ): SkippedDecision {
    const decision: SkippedDecision = { cycle, date, outcome: 'skipped', reason };
    if (detail !== undefined) decision.detail = detail;
    this.log(decision);
    return decision;
  }

  private log<T extends ImprovementDecision>(decision: T): T {
    switch (decision.outcome) {
      case 'promoted':
        logger.info(
          {
            cycle: decision.cycle,
            date: decision.date,
            version: decision.version.version,
            improvementType: decision.version.improvementType,
            rankCorrelation: decision.candidate.rankCorrelation,
            avgReturn: decision.candidate.avgReturn,
            reasons: decision.evaluation?.reasons ?? ['no active strategy'],
          },
          'Candidate promoted'
        );
        break;
      case 'rejected':
        logger.info(
          {
            cycle: decision.cycle,
            date: decision.date,
            corrDelta: decision.evaluation.corrDelta,
            returnDelta: decision.evaluation.returnDelta,
          },
          'Candidate rejected'
        );
        break;
      case 'skipped':
        logger.info(
          { cycle: decision.cycle, date: decision.date, reason: decision.reason, detail: decision.detail },
          'Improvement cycle skipped'
        );
        break;
    }
    return decision;
  }
}
