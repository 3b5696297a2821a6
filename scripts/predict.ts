/**
 * Daily Prediction Script
 * Scores the universe with the active strategy and emits a buy directive
 *
 * Usage: npx tsx scripts/predict.ts [--date=YYYY-MM-DD]
 */

import './lib/load-env';
import { getConfig } from '../src/core/config';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { DryRunExecutor } from '../src/execution/directives';
import { createFileSnapshotSource } from '../src/providers/file_snapshot_provider';
import { withCycleLock } from '../src/run/cycle_lock';
import { runPrediction } from '../src/selection/prediction_engine';
import { resolveActiveStrategy } from '../src/strategy/registry';
import { createChildLogger } from '../src/utils/logger';
import { getDateFlag } from './lib/cli';

const logger = createChildLogger('predict');

async function main() {
  const date = getDateFlag();
  initializeDatabase();

  try {
    const result = await withCycleLock('predict', date, async () => {
      const config = getConfig();
      const snapshot = createFileSnapshotSource(config).loadDailySnapshot(date);
      const strategy = resolveActiveStrategy(config.engine.strategyTimeoutMs);

      const prediction = runPrediction({
        date,
        snapshot,
        universe: config.universe.symbols,
        strategy,
      });
      await new DryRunExecutor().submit(prediction.directive);
      return prediction;
    });

    console.log('\n' + '='.repeat(50));
    console.log(`Prediction for ${result.date}`);
    console.log('='.repeat(50));
    console.log(`Strategy:      v${result.modelVersion}`);
    console.log(`Chosen asset:  ${result.chosenAsset} (score ${result.chosenScore.toFixed(4)})`);
    if (result.missingAssets.length > 0) {
      console.log(`Defaulted:     ${result.missingAssets.join(', ')}`);
    }
    if (result.failedAssets.length > 0) {
      console.log(`Scored 0:      ${result.failedAssets.join(', ')}`);
    }
    console.log(`Directive:     ${result.directive.directive} ${result.directive.asset}`);
    console.log('='.repeat(50) + '\n');
  } catch (error) {
    logger.error({ error, date }, 'Prediction failed');
    console.error('Prediction failed:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
