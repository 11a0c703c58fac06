import type { Logger } from 'pino';

import {
  type InterchainTokenRouter,
  type LocalChain,
  type MessageId,
  type TransferPayload,
  encodeTransferPayload,
} from '@ichain/core';
import { type Address, type Domain, assert, rootLogger } from '@ichain/utils';

import type { RelayerConfig } from '../config/RelayerConfig.js';

import type { RelayerObserver } from './events.js';
import {
  type TransferWhitelist,
  buildWhitelist,
  transferMatchesWhitelist,
} from './whitelist.js';

/**
 * An outbound transfer read off the origin's event log, with the message
 * body rebuilt from the burn it records.
 */
export interface PendingTransfer extends TransferPayload {
  messageId: MessageId;
  destinationDomain: Domain;
  /** Token contract that burned the amount on the origin */
  token: Address;
  body: string;
}

export type RelayOutcome = 'relayed' | 'skipped';

export interface RelayReport {
  relayed: MessageId[];
  skipped: MessageId[];
  failed: MessageId[];
}

export interface TransferRelayerOptions {
  origin: LocalChain;
  destination: LocalChain;
  /** Router deployed on `destination` */
  router: InterchainTokenRouter;
  /** Account that signs delivery calls on the destination */
  relayer: Address;
  whitelist?: { senders?: Address[]; recipients?: Address[] };
  observer?: RelayerObserver;
  logger?: Logger;
}

/**
 * Moves transfers from one domain's event log to the router of another.
 * Relaying is serial; delivery itself is idempotent on the destination
 * mailbox, so relaying the same transfer twice only skips.
 */
export class TransferRelayer {
  readonly origin: LocalChain;
  readonly destination: LocalChain;
  readonly relayer: Address;
  public readonly logger: Logger;

  protected readonly router: InterchainTokenRouter;
  protected readonly whitelist: TransferWhitelist | undefined;
  protected readonly observer: RelayerObserver;

  constructor({
    origin,
    destination,
    router,
    relayer,
    whitelist = undefined,
    observer = {},
    logger = rootLogger,
  }: TransferRelayerOptions) {
    assert(relayer.length > 0, 'Relayer address must not be empty');
    assert(
      router.chain === destination,
      `Router ${router.address} is not deployed on domain ${destination.domain}`,
    );
    this.origin = origin;
    this.destination = destination;
    this.router = router;
    this.relayer = relayer;
    this.observer = observer;
    this.logger = logger.child({
      module: 'TransferRelayer',
      origin: origin.domain,
      destination: destination.domain,
    });
    if (whitelist) {
      this.whitelist = buildWhitelist(whitelist);
    }
  }

  /**
   * Builds a relayer signing as `config.relayer` and filtering through
   * `config.whitelist`.
   */
  static fromConfig(
    config: RelayerConfig,
    options: Omit<TransferRelayerOptions, 'relayer' | 'whitelist'>,
  ): TransferRelayer {
    return new TransferRelayer({
      ...options,
      relayer: config.relayer,
      whitelist: config.whitelist,
    });
  }

  /**
   * Every transfer on the origin addressed to the destination router's
   * domain, in dispatch order. Delivered ones are included.
   */
  pendingTransfers(): PendingTransfer[] {
    return this.origin.events
      .filter('RemoteTransfer')
      .filter(({ event }) => event.destinationDomain === this.router.localDomain)
      .map(({ address, event }) => ({
        messageId: event.messageId,
        sender: event.sender,
        recipient: event.recipient,
        amount: event.amount,
        originDomain: event.originDomain,
        destinationDomain: event.destinationDomain,
        token: address,
        body: encodeTransferPayload(event),
      }));
  }

  relayMessage(transfer: PendingTransfer): RelayOutcome {
    const { messageId } = transfer;
    const context = {
      transfer,
      originDomain: this.origin.domain,
      destinationDomain: this.destination.domain,
      messageId,
    };

    if (this.whitelist && !transferMatchesWhitelist(this.whitelist, transfer)) {
      this.logger.debug(
        { messageId, sender: transfer.sender, recipient: transfer.recipient },
        `Skipping transfer ${messageId} not matching whitelist`,
      );
      this.observer.onEvent?.({
        type: 'messageSkipped',
        ...context,
        reason: 'whitelist',
      });
      return 'skipped';
    }

    if (this.router.mailbox.delivered(messageId)) {
      this.logger.info(`Transfer ${messageId} already delivered`);
      this.observer.onEvent?.({
        type: 'messageSkipped',
        ...context,
        reason: 'already_delivered',
      });
      return 'skipped';
    }

    const startTime = Date.now();
    try {
      this.logger.info(`Relaying transfer ${messageId}`);
      this.destination.execute(this.relayer, (ctx) =>
        this.router.process(ctx, transfer.body, messageId),
      );
    } catch (error) {
      this.observer.onEvent?.({
        type: 'messageFailed',
        ...context,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }

    this.observer.onEvent?.({
      type: 'messageRelayed',
      ...context,
      durationMs: Date.now() - startTime,
    });
    return 'relayed';
  }

  relayAll(transfers = this.pendingTransfers()): RelayReport {
    const report: RelayReport = { relayed: [], skipped: [], failed: [] };
    for (const transfer of transfers) {
      try {
        const outcome = this.relayMessage(transfer);
        report[outcome].push(transfer.messageId);
      } catch (error) {
        this.logger.error(
          { err: error, messageId: transfer.messageId },
          `Failed to relay transfer ${transfer.messageId}`,
        );
        report.failed.push(transfer.messageId);
      }
    }
    this.logger.info(
      {
        relayed: report.relayed.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      },
      'Relayed pending transfers',
    );
    return report;
  }
}
