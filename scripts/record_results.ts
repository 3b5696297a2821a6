/**
 * Result Recording Script
 * Back-fills the outcome of a closed holding day and emits a sell directive
 *
 * Usage: npx tsx scripts/record_results.ts [--date=YYYY-MM-DD]
 *   --date defaults to yesterday (UTC), the day whose pick is being closed
 */

import './lib/load-env';
import { getConfig } from '../src/core/config';
import { assertDateKey, previousDateKey, utcDateKey } from '../src/core/time';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { DryRunExecutor } from '../src/execution/directives';
import { createFileSnapshotSource } from '../src/providers/file_snapshot_provider';
import { recordOutcome } from '../src/results/recorder';
import { withCycleLock } from '../src/run/cycle_lock';
import { createChildLogger } from '../src/utils/logger';
import { getFlagValue } from './lib/cli';

const logger = createChildLogger('record_results');

async function main() {
  const raw = getFlagValue('date');
  const date = raw ? assertDateKey(raw) : previousDateKey(utcDateKey());
  initializeDatabase();

  try {
    const report = await withCycleLock('record_results', date, async () => {
      const config = getConfig();
      const source = createFileSnapshotSource(config);

      const realized = source.loadRealizedReturns(date);
      if (!realized) {
        throw new Error(`No realized returns file for ${date}`);
      }

      const outcome = recordOutcome({
        date,
        realizedReturns: realized.returns,
        snapshot: source.loadDailySnapshot(date),
        universe: config.universe.symbols,
      });
      await new DryRunExecutor().submit({
        asset: outcome.chosenAsset,
        directive: 'sell-all',
        date: utcDateKey(),
      });
      return outcome;
    });

    console.log('\n' + '='.repeat(50));
    console.log(`Outcome for ${report.date}`);
    console.log('='.repeat(50));
    console.log(`Chosen asset:  ${report.chosenAsset}`);
    console.log(`Return:        ${report.actualReturn.toFixed(2)}%`);
    console.log(`Rank:          ${report.rank} / ${report.universeSize}`);
    console.log('\nTop performers:');
    report.topPerformers.forEach((p, i) => {
      console.log(`  ${i + 1}. ${p.asset} ${p.realizedReturn.toFixed(2)}%`);
    });
    console.log('='.repeat(50) + '\n');
  } catch (error) {
    logger.error({ error, date }, 'Recording results failed');
    console.error('Recording results failed:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
