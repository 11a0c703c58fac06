import type { Address, Amount } from '@ichain/utils';

import type { CallContext, LocalChain } from '../runtime/LocalChain.js';

/**
 * The slice of a fungible-token ledger the Mailbox consumes to collect
 * dispatch fees.
 */
export interface IFungibleLedger {
  readonly address: Address;
  readonly chain: LocalChain;
  balanceOf(account: Address): Amount;
  /**
   * Moves `amount` from `mainAccount` to `to`, spending the allowance
   * `mainAccount` granted to `ctx.caller`.
   */
  transferFrom(
    ctx: CallContext,
    amount: Amount,
    to: Address,
    mainAccount: Address,
  ): void;
}
