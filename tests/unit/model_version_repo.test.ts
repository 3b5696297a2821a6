import { describe, expect, it } from 'vitest';
import { PersistenceError } from '@/core/errors';
import { getDatabase } from '@/data/db';
import {
  appendModelVersion,
  countVersions,
  getActiveModelVersion,
  getLatestVersionNumber,
  getVersion,
  listVersions,
  recoverActivePointer,
  requireVersion,
} from '@/data/repositories/model_version_repo';
import type { NewModelVersion } from '@/types/signal';
import { useTempStore } from '../helpers/temp_store';

function entry(body: string, overrides: Partial<NewModelVersion> = {}): NewModelVersion {
  return {
    strategyCode: `function scoreAsset(a, b, c, d) { return ${body}; }`,
    rankCorrelation: 0.1,
    avgDailyReturn: 0.2,
    improvementType: 'daily',
    ...overrides,
  };
}

describe('model_version_repo', () => {
  useTempStore('model-versions');

  it('starts empty with no active version', () => {
    expect(getLatestVersionNumber()).toBeNull();
    expect(getActiveModelVersion()).toBeNull();
    expect(countVersions()).toBe(0);
  });

  it('assigns versions max + 1 and activates each new one', () => {
    const v1 = appendModelVersion(entry('a', { improvementType: 'initial' }));
    const v2 = appendModelVersion(entry('b'));

    expect(v1.version).toBe(1);
    expect(v2.version).toBe(2);
    expect(countVersions()).toBe(2);
    expect(getActiveModelVersion()?.version).toBe(2);
    expect(listVersions().map((v) => v.version)).toEqual([2, 1]);
  });

  it('keeps archived code retrievable', () => {
    appendModelVersion(entry('a', { improvementType: 'initial' }));
    appendModelVersion(entry('b'));

    expect(getVersion(1)?.strategyCode).toBe('function scoreAsset(a, b, c, d) { return a; }');
    expect(getVersion(1)?.improvementType).toBe('initial');
    expect(getVersion(99)).toBeNull();
    expect(() => requireVersion(99)).toThrow('Unknown model version 99');
  });

  it('refuses updates and deletes of logged versions', () => {
    appendModelVersion(entry('a'));
    const db = getDatabase();

    expect(() => db.prepare("UPDATE model_versions SET strategy_code = 'x'").run()).toThrow(
      'append-only'
    );
    expect(() => db.prepare('DELETE FROM model_versions').run()).toThrow('append-only');
  });

  it('rolls back the version row when the pointer write fails', () => {
    getDatabase().exec(`
      CREATE TRIGGER fail_pointer BEFORE INSERT ON active_strategy
      BEGIN
        SELECT RAISE(ABORT, 'pointer write failed');
      END;
    `);

    expect(() => appendModelVersion(entry('a'))).toThrow(PersistenceError);
    expect(countVersions()).toBe(0);
    expect(getActiveModelVersion()).toBeNull();
  });

  it('repoints a missing pointer at the newest version', () => {
    appendModelVersion(entry('a'));
    appendModelVersion(entry('b'));
    getDatabase().prepare('DELETE FROM active_strategy').run();

    expect(getActiveModelVersion()).toBeNull();
    const recovery = recoverActivePointer();

    expect(recovery).toEqual({ repaired: true, activeVersion: 2, previousPointer: null });
    expect(getActiveModelVersion()?.version).toBe(2);
  });

  it('leaves a valid pointer alone', () => {
    appendModelVersion(entry('a'));
    expect(recoverActivePointer()).toEqual({
      repaired: false,
      activeVersion: 1,
      previousPointer: 1,
    });
  });

  it('records the source version of a rollback', () => {
    appendModelVersion(entry('a'));
    appendModelVersion(entry('b'));
    const restored = appendModelVersion(
      entry('a', { improvementType: 'rollback', rolledBackFrom: 1 })
    );

    expect(restored.version).toBe(3);
    expect(restored.rolledBackFrom).toBe(1);
    expect(restored.codeHash).toBe(getVersion(1)?.codeHash);
  });
});
