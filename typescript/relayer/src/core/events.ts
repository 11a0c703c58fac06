import type { Domain } from '@ichain/utils';

import type { PendingTransfer } from './TransferRelayer.js';

/**
 * Relayer events, useful for metrics and monitoring
 */
export type RelayerEvent =
  | {
      type: 'messageRelayed';
      transfer: PendingTransfer;
      originDomain: Domain;
      destinationDomain: Domain;
      messageId: string;
      durationMs: number;
    }
  | {
      type: 'messageFailed';
      transfer: PendingTransfer;
      originDomain: Domain;
      destinationDomain: Domain;
      messageId: string;
      error: Error;
    }
  | {
      type: 'messageSkipped';
      transfer: PendingTransfer;
      originDomain: Domain;
      destinationDomain: Domain;
      messageId: string;
      reason: 'whitelist' | 'already_delivered';
    };

export interface RelayerObserver {
  onEvent?: (event: RelayerEvent) => void;
}
