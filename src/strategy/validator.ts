/**
 * Shape checks for strategy source before it is compiled or registered.
 * Candidate code comes from an untrusted oracle, so anything outside a single
 * four-argument scoreAsset declaration is rejected.
 */

export const STRATEGY_FUNCTION_NAME = 'scoreAsset';
export const STRATEGY_ARITY = 4;
export const MAX_STRATEGY_LENGTH = 4000;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const HEADER = /^function\s+scoreAsset\s*\(([^)]*)\)\s*\{/;
const SELF_REFERENCE = new RegExp(`\\b${STRATEGY_FUNCTION_NAME}\\b`);

const FORBIDDEN_TOKENS = [
  'require',
  'import',
  'process',
  'globalThis',
  'eval',
  'Function',
  'constructor',
  '__proto__',
  'prototype',
  'fetch',
  'setTimeout',
  'setInterval',
  'Proxy',
  'Reflect',
  'WebAssembly',
  '__args',
  'Promise',
  'then',
  'queueMicrotask',
  'async',
  'await',
  'Date',
  'random',
];

export interface StrategyValidation {
  valid: boolean;
  code: string;
  parameters: string[];
  violations: string[];
}

/**
 * Index of the brace closing the block opened at `openIndex`, skipping string
 * literals and comments. Returns -1 when the block never closes.
 */
export function findMatchingBrace(source: string, openIndex: number): number {
  let depth = 0;
  let i = openIndex;

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i);
      i = end === -1 ? source.length : end + 1;
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 2;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      i++;
      while (i < source.length && source[i] !== ch) {
        i += source[i] === '\\' ? 2 : 1;
      }
      i++;
      continue;
    }
    if (ch === '{') depth++;
    if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }

  return -1;
}

export function validateStrategyCode(raw: string): StrategyValidation {
  const code = raw.replace(/\r\n/g, '\n').trim();
  const violations: string[] = [];
  let parameters: string[] = [];

  if (!code) {
    return { valid: false, code, parameters, violations: ['empty strategy code'] };
  }
  if (code.length > MAX_STRATEGY_LENGTH) {
    violations.push(`code exceeds ${MAX_STRATEGY_LENGTH} characters`);
  }

  const header = HEADER.exec(code);
  if (!header) {
    violations.push(`code must start with "function ${STRATEGY_FUNCTION_NAME}(...) {"`);
  } else {
    const paramList = header[1].trim();
    parameters = paramList ? paramList.split(',').map((p) => p.trim()) : [];

    if (parameters.length !== STRATEGY_ARITY) {
      violations.push(`expected ${STRATEGY_ARITY} parameters, found ${parameters.length}`);
    }
    const badParams = parameters.filter((p) => !IDENTIFIER.test(p));
    if (badParams.length > 0) {
      violations.push(`parameters must be plain identifiers: ${badParams.join(', ')}`);
    }
    if (new Set(parameters).size !== parameters.length) {
      violations.push('parameter names must be distinct');
    }

    const bodyOpen = header[0].length - 1;
    const bodyClose = findMatchingBrace(code, bodyOpen);
    if (bodyClose === -1) {
      violations.push('function body is not closed');
    } else {
      if (bodyClose !== code.length - 1) {
        violations.push('only a single function declaration is allowed');
      }
      if (SELF_REFERENCE.test(code.slice(bodyOpen, bodyClose))) {
        violations.push(`${STRATEGY_FUNCTION_NAME} must not refer to itself`);
      }
    }
  }

  for (const token of FORBIDDEN_TOKENS) {
    if (new RegExp(`\\b${token.replace(/\$/g, '\\$')}\\b`).test(code)) {
      violations.push(`forbidden identifier: ${token}`);
    }
  }

  if (!/\breturn\b/.test(code)) {
    violations.push('function never returns a score');
  }

  return { valid: violations.length === 0, code, parameters, violations };
}
