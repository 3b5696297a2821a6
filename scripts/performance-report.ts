#!/usr/bin/env tsx
/**
 * Performance Report CLI Tool
 * Summarizes resolved trades and the strategy version history
 */

import './lib/load-env';
import { getConfig } from '../src/core/config';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { listVersions } from '../src/data/repositories/model_version_repo';
import { getPerformanceSummary, listRecentRecords } from '../src/data/repositories/trade_repo';
import { getFlagValue } from './lib/cli';

function fmt(value: number | null, digits: number, suffix = ''): string {
  return value === null ? 'n/a' : `${value.toFixed(digits)}${suffix}`;
}

function generateReport(): void {
  const recentCount = Number.parseInt(getFlagValue('recent') ?? '10', 10) || 10;
  const summary = getPerformanceSummary();
  const universeSize = getConfig().universe.symbols.length;

  console.log('\n' + '='.repeat(80));
  console.log('PERFORMANCE REPORT'.padStart(45));
  console.log('='.repeat(80));
  console.log();

  if (summary.totalTrades === 0) {
    console.log('No resolved trades yet. Run predict and record_results first.\n');
  } else {
    console.log(`Total Trades:     ${summary.totalTrades}`);
    console.log(`Average Return:   ${fmt(summary.avgReturn, 3, '%')}`);
    console.log(`Average Rank:     ${fmt(summary.avgRank, 2)} / ${universeSize}`);
    console.log(`Win Rate:         ${fmt(summary.winRatePct, 1, '%')}`);
    console.log(`Best Trade:       ${fmt(summary.bestReturn, 2, '%')}`);
    console.log(`Worst Trade:      ${fmt(summary.worstReturn, 2, '%')}`);
  }
  console.log(`Current Version:  ${summary.currentVersion === null ? 'baseline' : `v${summary.currentVersion}`}`);
  console.log();

  const recent = listRecentRecords(recentCount);
  if (recent.length > 0) {
    console.log('Recent Picks:');
    for (const r of recent) {
      const outcome =
        r.actualReturnOfChosen === null
          ? 'pending'
          : `${r.actualReturnOfChosen.toFixed(2)}% rank ${r.rankOfChosen}`;
      console.log(`  ${r.date}  ${r.chosenAsset.padEnd(10)} v${r.modelVersion}  ${outcome}`);
    }
    console.log();
  }

  const versions = listVersions(10);
  if (versions.length > 0) {
    console.log('Strategy Versions:');
    for (const v of versions) {
      console.log(
        `  v${v.version}  ${v.improvementType.padEnd(10)} corr ${fmt(v.rankCorrelation, 4)}  ` +
          `avg ${fmt(v.avgDailyReturn, 3, '%')}  ${v.createdAt.split('T')[0]}`
      );
    }
    console.log();
  }

  console.log('='.repeat(80) + '\n');
}

try {
  initializeDatabase();
  generateReport();
} catch (error) {
  console.error('Failed to generate report:', error);
  process.exitCode = 1;
} finally {
  closeDatabase();
}
