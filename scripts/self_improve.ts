/**
 * Self-Improvement Script
 * Asks the oracle for a candidate strategy and promotes it on a measurable gain
 *
 * Usage: npx tsx scripts/self_improve.ts [--date=YYYY-MM-DD] [--long-term]
 *   --long-term forces the long-term cycle regardless of the calendar
 */

import './lib/load-env';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { recoverActivePointer } from '../src/data/repositories/model_version_repo';
import { ImprovementController, type ImprovementDecision } from '../src/improvement/controller';
import { createStrategyOracle } from '../src/llm/adapter';
import { withCycleLock } from '../src/run/cycle_lock';
import { createChildLogger } from '../src/utils/logger';
import { getDateFlag, hasFlag } from './lib/cli';

const logger = createChildLogger('self_improve');

function describe(decision: ImprovementDecision): string {
  switch (decision.outcome) {
    case 'promoted':
      return `promoted as v${decision.version.version} (${decision.version.improvementType}), ` +
        `corr ${decision.candidate.rankCorrelation.toFixed(4)}, ` +
        `avg return ${decision.candidate.avgReturn.toFixed(3)}%`;
    case 'rejected':
      return `rejected: corr delta ${decision.evaluation.corrDelta.toFixed(4)}, ` +
        `return delta ${decision.evaluation.returnDelta.toFixed(3)}%`;
    case 'skipped':
      return `skipped (${decision.reason})${decision.detail ? `: ${decision.detail}` : ''}`;
  }
}

async function main() {
  const date = getDateFlag();
  const forceLongTerm = hasFlag('long-term');
  initializeDatabase();

  try {
    const decisions = await withCycleLock('self_improve', date, async () => {
      const pointer = recoverActivePointer();
      if (pointer.repaired) {
        logger.warn(pointer, 'Active strategy pointer repaired');
      }

      const controller = new ImprovementController({ oracle: createStrategyOracle() });
      if (forceLongTerm) {
        return [await controller.runLongTermCycle(date, { force: true })];
      }
      return controller.runCycle(date);
    });

    console.log(`\nImprovement cycle for ${date}`);
    for (const decision of decisions) {
      console.log(`  ${decision.cycle.padEnd(10)} ${describe(decision)}`);
    }
    console.log();
  } catch (error) {
    logger.error({ error, date }, 'Improvement cycle failed');
    console.error('Improvement cycle failed:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
