import type { Address } from '@ichain/utils';

import type { PendingTransfer } from './TransferRelayer.js';

export interface TransferWhitelist {
  senders: Set<Address>;
  recipients: Set<Address>;
}

export function buildWhitelist({
  senders = [],
  recipients = [],
}: {
  senders?: Address[];
  recipients?: Address[];
}): TransferWhitelist {
  return { senders: new Set(senders), recipients: new Set(recipients) };
}

// an empty set allows every address
// a non-empty set must contain the transfer's sender (or recipient)
export function transferMatchesWhitelist(
  whitelist: TransferWhitelist,
  transfer: PendingTransfer,
): boolean {
  if (whitelist.senders.size !== 0 && !whitelist.senders.has(transfer.sender)) {
    return false;
  }
  if (
    whitelist.recipients.size !== 0 &&
    !whitelist.recipients.has(transfer.recipient)
  ) {
    return false;
  }
  return true;
}
