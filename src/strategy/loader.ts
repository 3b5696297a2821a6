/**
 * Compiles strategy source into a ScoringStrategy.
 *
 * The source runs in its own vm context: no host globals, string code
 * generation disabled, frozen intrinsics, microtasks drained inside the
 * call and a wall-clock limit on every call.
 */

import vm from 'vm';
import { InvalidStrategyError, toError } from '@/core/errors';
import { strategyCodeHash } from '@/core/seed';
import { createChildLogger } from '@/utils/logger';
import { BASELINE_STRATEGY_CODE, BASELINE_VERSION } from './baseline';
import type { ScoringInputs, ScoringStrategy, StrategyLoadOptions } from './types';
import { STRATEGY_ARITY, validateStrategyCode } from './validator';

const logger = createChildLogger('strategy_loader');

export const DEFAULT_STRATEGY_TIMEOUT_MS = 50;

// The global object of a vm context cannot be frozen, so the intrinsics a
// strategy can reach are frozen one by one instead.
const HARDEN_SCRIPT = `
  delete Math.random;
  globalThis.Date = undefined;
  globalThis.Promise = undefined;
  for (const intrinsic of [Object, Array, Number, String, Boolean]) {
    Object.freeze(intrinsic);
    Object.freeze(intrinsic.prototype);
  }
  Object.freeze(Math);
  Object.freeze(JSON);
  Object.freeze(scoreAsset);
  globalThis.__args = [0, 0, 0, 0];
  __args;
`;

const INVOKE_SCRIPT = new vm.Script('scoreAsset(__args[0], __args[1], __args[2], __args[3])', {
  filename: 'strategy-invoke.js',
});

class VmScoringStrategy implements ScoringStrategy {
  constructor(
    readonly version: number | null,
    readonly label: string,
    readonly code: string,
    readonly codeHash: string,
    private readonly context: vm.Context,
    private readonly args: unknown[],
    private readonly timeoutMs: number
  ) {}

  score(inputs: ScoringInputs): number {
    this.args[0] = inputs.return24h;
    this.args[1] = inputs.return6h;
    this.args[2] = inputs.volumeRatio;
    this.args[3] = inputs.newsSentiment;

    const result: unknown = INVOKE_SCRIPT.runInContext(this.context, { timeout: this.timeoutMs });

    if (typeof result !== 'number') {
      throw new TypeError(`strategy returned ${typeof result}, expected number`);
    }
    if (!Number.isFinite(result)) {
      throw new RangeError(`strategy returned non-finite score ${result}`);
    }
    return result;
  }
}

/**
 * Stand-in for code that failed to load: every call throws, so the fault
 * boundary scores each asset neutrally.
 */
class UnloadableStrategy implements ScoringStrategy {
  constructor(
    readonly version: number | null,
    readonly label: string,
    readonly code: string,
    readonly codeHash: string,
    private readonly error: Error
  ) {}

  score(): number {
    throw this.error;
  }
}

export function loadStrategy(code: string, options: StrategyLoadOptions = {}): ScoringStrategy {
  const validation = validateStrategyCode(code);
  if (!validation.valid) {
    throw new InvalidStrategyError('shape check failed', validation.violations);
  }
  return compileStrategy(validation.code, options);
}

/**
 * Compiles code that has already passed the shape checks.
 */
export function compileStrategy(code: string, options: StrategyLoadOptions = {}): ScoringStrategy {
  const timeoutMs = options.timeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS;
  const context = vm.createContext(Object.create(null), {
    name: options.label ?? 'strategy',
    codeGeneration: { strings: false, wasm: false },
    microtaskMode: 'afterEvaluate',
  });

  let arity: unknown;
  let args: unknown;
  try {
    arity = new vm.Script(
      `"use strict";\n${code}\ntypeof scoreAsset === 'function' ? scoreAsset.length : -1;`,
      { filename: 'strategy.js' }
    ).runInContext(context, { timeout: timeoutMs });
    args = vm.runInContext(HARDEN_SCRIPT, context, { timeout: timeoutMs });
  } catch (error) {
    throw new InvalidStrategyError(`failed to compile: ${toError(error).message}`);
  }

  if (arity !== STRATEGY_ARITY) {
    throw new InvalidStrategyError(`scoreAsset must take ${STRATEGY_ARITY} arguments`);
  }
  if (!Array.isArray(args)) {
    throw new InvalidStrategyError('failed to prepare invocation arguments');
  }

  return new VmScoringStrategy(
    options.version ?? null,
    options.label ?? (options.version != null ? `v${options.version}` : 'candidate'),
    code,
    strategyCodeHash(code),
    context,
    args,
    timeoutMs
  );
}

/**
 * Like loadStrategy, but code that cannot be loaded yields a strategy whose
 * every call fails (and so scores 0.0) instead of aborting the caller.
 */
export function loadStrategyOrNeutral(
  code: string,
  options: StrategyLoadOptions = {}
): ScoringStrategy {
  try {
    return loadStrategy(code, options);
  } catch (error) {
    const err = toError(error);
    logger.error(
      { version: options.version ?? null, error: err.message },
      'Strategy failed to load; every asset will score neutral'
    );
    return new UnloadableStrategy(
      options.version ?? null,
      options.label ?? 'unloadable',
      code,
      strategyCodeHash(code),
      err
    );
  }
}

export function loadBaselineStrategy(timeoutMs?: number): ScoringStrategy {
  return loadStrategy(BASELINE_STRATEGY_CODE, {
    version: BASELINE_VERSION,
    label: 'baseline',
    timeoutMs,
  });
}
