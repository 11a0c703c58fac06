import type { Address, Amount } from '@ichain/utils';

import type { CallContext } from '../runtime/LocalChain.js';

/**
 * A contract the router can credit once an inbound transfer is delivered.
 */
export interface IRemoteMintHandler {
  readonly address: Address;
  handleRemoteMint(
    ctx: CallContext,
    sender: Address,
    recipient: Address,
    amount: Amount,
  ): void;
}

export function isRemoteMintHandler(
  contract: object,
): contract is IRemoteMintHandler {
  return (
    'handleRemoteMint' in contract &&
    typeof contract.handleRemoteMint === 'function' &&
    'address' in contract &&
    typeof contract.address === 'string'
  );
}
