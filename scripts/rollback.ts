/**
 * Rollback Script
 * Re-activates an archived strategy version as a new version
 *
 * Usage: npx tsx scripts/rollback.ts --version=N
 *        npx tsx scripts/rollback.ts          (lists versions)
 */

import './lib/load-env';
import { utcDateKey } from '../src/core/time';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { getActiveModelVersion, listVersions } from '../src/data/repositories/model_version_repo';
import { ImprovementController } from '../src/improvement/controller';
import { TemplateStrategyOracle } from '../src/llm/adapter';
import { withCycleLock } from '../src/run/cycle_lock';
import { getFlagValue } from './lib/cli';

function printVersions(): void {
  const active = getActiveModelVersion();
  console.log('\nStrategy versions (newest first):');
  for (const v of listVersions(20)) {
    const marker = v.version === active?.version ? '*' : ' ';
    const corr = v.rankCorrelation === null ? '   n/a' : v.rankCorrelation.toFixed(4);
    const from = v.rolledBackFrom === null ? '' : ` from v${v.rolledBackFrom}`;
    console.log(`${marker} v${v.version}  ${v.improvementType}${from}  corr ${corr}  ${v.createdAt}`);
  }
  console.log();
}

async function main() {
  initializeDatabase();

  try {
    const raw = getFlagValue('version');
    if (raw === undefined) {
      printVersions();
      return;
    }

    const version = Number.parseInt(raw, 10);
    if (!Number.isInteger(version) || version <= 0) {
      throw new Error(`--version must be a positive integer, got ${raw}`);
    }

    const controller = new ImprovementController({ oracle: new TemplateStrategyOracle() });
    const result = await withCycleLock('rollback', utcDateKey(), () => controller.rollbackTo(version));

    if (result.status === 'already_active') {
      console.log(`v${version} code is already active as v${result.version.version}`);
    } else {
      console.log(`Restored v${version} as v${result.version.version}`);
    }
    printVersions();
  } catch (error) {
    console.error('Rollback failed:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
