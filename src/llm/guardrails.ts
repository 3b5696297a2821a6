/**
 * Pulls strategy source out of free-form oracle responses.
 */

import { createChildLogger } from '@/utils/logger';
import { STRATEGY_FUNCTION_NAME, findMatchingBrace } from '@/strategy/validator';

const logger = createChildLogger('llm_guardrails');

const FENCED_BLOCK = /```[a-zA-Z]*\s*\n([\s\S]*?)```/g;
const DECLARATION = new RegExp(`function\\s+${STRATEGY_FUNCTION_NAME}\\s*\\(`);

function sliceDeclaration(text: string): string | null {
  const match = DECLARATION.exec(text);
  if (!match) return null;

  const open = text.indexOf('{', match.index);
  if (open === -1) return null;

  const close = findMatchingBrace(text, open);
  if (close === -1) return null;

  return text.slice(match.index, close + 1);
}

/**
 * The first scoreAsset declaration found in a fenced block, falling back to
 * one in the bare text. Null when the response carries none.
 */
export function extractStrategyCode(responseText: string): string | null {
  const text = responseText.replace(/\r\n/g, '\n');

  for (const block of text.matchAll(FENCED_BLOCK)) {
    const code = sliceDeclaration(block[1]);
    if (code) return code.trim();
  }

  const bare = sliceDeclaration(text);
  if (!bare) {
    logger.warn({ length: text.length }, 'No scoreAsset declaration in oracle response');
    return null;
  }
  return bare.trim();
}
