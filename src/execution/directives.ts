/**
 * Trade directives handed to the brokerage collaborator. The engine decides
 * which asset and when; order mechanics live behind TradeExecutor.
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('execution');

export type DirectiveKind = 'buy-all-cash' | 'sell-all';

export interface TradeDirective {
  asset: string;
  directive: DirectiveKind;
  date: string;
}

export interface ExecutionReceipt {
  directive: TradeDirective;
  status: 'submitted' | 'logged';
  submittedAt: string;
  reference: string | null;
}

export interface TradeExecutor {
  submit(directive: TradeDirective): Promise<ExecutionReceipt>;
}

/**
 * Records directives without contacting a broker.
 */
export class DryRunExecutor implements TradeExecutor {
  async submit(directive: TradeDirective): Promise<ExecutionReceipt> {
    logger.info(directive, 'Dry run: trade directive not sent to a broker');
    return {
      directive,
      status: 'logged',
      submittedAt: new Date().toISOString(),
      reference: null,
    };
  }
}
