import type { Logger } from 'pino';

import {
  type Address,
  type Amount,
  type Domain,
  assert,
  isPositiveInteger,
} from '@ichain/utils';

import { AlreadyDeliveredError } from '../errors.js';
import type { IFungibleLedger } from '../interfaces/IFungibleLedger.js';
import type { IMailbox } from '../interfaces/IMailbox.js';
import { type MessageId, buildMessage, deriveId } from '../messaging/message.js';
import { OwnableContract, assertSameChain } from '../runtime/Contract.js';
import type { CallContext, LocalChain } from '../runtime/LocalChain.js';
import type { StorageMap, StorageValue } from '../runtime/storage.js';

export const DEFAULT_ISM = 'defaultIsm';
export const DEFAULT_HOOK = 'defaultHook';
export const DEFAULT_REQUIRED_HOOK = 'requiredHook';

/**
 * Delivery state of one message id. `deliveredAtBlock` 0 means undelivered;
 * once set the record never changes again.
 */
export interface DeliveryRecord {
  readonly processor: Address | undefined;
  readonly deliveredAtBlock: number;
}

const UNDELIVERED: DeliveryRecord = Object.freeze({
  processor: undefined,
  deliveredAtBlock: 0,
});

export interface MailboxOptions {
  address: Address;
  /** Deployer, becomes the owner and fee beneficiary */
  owner: Address;
  /** Ledger the dispatch fee is collected on */
  feeToken: IFungibleLedger;
  logger?: Logger;
}

export class Mailbox extends OwnableContract implements IMailbox {
  readonly localDomain: Domain;

  private readonly feeToken: IFungibleLedger;
  private readonly nonceSlot: StorageValue<number>;
  private readonly latestDispatchedIdSlot: StorageValue<MessageId>;
  private readonly defaultIsmSlot: StorageValue<string>;
  private readonly defaultHookSlot: StorageValue<string>;
  private readonly requiredHookSlot: StorageValue<string>;
  private readonly dispatchFee: StorageValue<Amount>;
  private readonly deliveries: StorageMap<MessageId, DeliveryRecord>;

  constructor(chain: LocalChain, options: MailboxOptions) {
    assertSameChain(chain, options.feeToken, 'Fee token');
    super(
      chain,
      options.address,
      options.owner,
      (options.logger ?? chain.logger).child({ module: 'Mailbox' }),
    );
    this.localDomain = chain.domain;
    this.feeToken = options.feeToken;
    this.nonceSlot = this.value(0);
    this.latestDispatchedIdSlot = this.value<MessageId>('');
    this.defaultIsmSlot = this.value(DEFAULT_ISM);
    this.defaultHookSlot = this.value(DEFAULT_HOOK);
    this.requiredHookSlot = this.value(DEFAULT_REQUIRED_HOOK);
    this.dispatchFee = this.value(0n);
    this.deliveries = this.map<MessageId, DeliveryRecord>(UNDELIVERED);
  }

  setDefaultIsm(ctx: CallContext, module: string): void {
    this.atomic(() => {
      this.onlyOwner(ctx);
      this.defaultIsmSlot.set(module);
      this.emit(ctx, { name: 'DefaultIsmSet', module });
    });
  }

  setDefaultHook(ctx: CallContext, hook: string): void {
    this.atomic(() => {
      this.onlyOwner(ctx);
      this.defaultHookSlot.set(hook);
      this.emit(ctx, { name: 'DefaultHookSet', hook });
    });
  }

  setRequiredHook(ctx: CallContext, hook: string): void {
    this.atomic(() => {
      this.onlyOwner(ctx);
      this.requiredHookSlot.set(hook);
      this.emit(ctx, { name: 'RequiredHookSet', hook });
    });
  }

  /**
   * Overwrites the flat per-dispatch fee. Zero or negative disables it.
   */
  setDispatchFee(ctx: CallContext, amount: Amount): void {
    this.atomic(() => {
      this.onlyOwner(ctx);
      this.dispatchFee.set(amount);
      this.emit(ctx, { name: 'DispatchFeeSet', amount });
    });
  }

  /**
   * Registers an outbound message and returns its id. Collects the
   * dispatch fee from the caller first; if that fails no nonce is used.
   */
  dispatch(
    ctx: CallContext,
    destinationDomain: Domain,
    recipientAddress: Address,
    messageBody: string,
  ): MessageId {
    return this.atomic(() => {
      const fee = this.dispatchFee.get();
      if (fee > 0n) {
        this.feeToken.transferFrom(
          this.forward(ctx),
          fee,
          this.owner(),
          ctx.caller,
        );
      }

      const nonce = this.nonceSlot.get();
      const message = buildMessage(
        this.localDomain,
        ctx.caller,
        destinationDomain,
        recipientAddress,
        messageBody,
        nonce,
      );
      const messageId = deriveId(message);

      this.nonceSlot.set(nonce + 1);
      this.latestDispatchedIdSlot.set(messageId);

      this.emit(ctx, {
        name: 'Dispatch',
        sender: ctx.caller,
        originDomain: this.localDomain,
        destinationDomain,
        recipient: recipientAddress,
        messageId,
        nonce,
      });
      this.logger.debug(
        {
          messageId,
          nonce,
          sender: ctx.caller,
          destinationDomain,
          fee: fee.toString(),
        },
        'Dispatched message',
      );
      return messageId;
    });
  }

  /**
   * Marks `messageId` delivered. The metadata is carried for a security
   * module and is not interpreted here.
   */
  process(ctx: CallContext, _metadata: string, messageId: MessageId): void {
    this.atomic(() => {
      if (this.delivered(messageId)) {
        this.logger.warn({ messageId, caller: ctx.caller }, 'Replay rejected');
        throw new AlreadyDeliveredError(messageId);
      }
      assert(
        isPositiveInteger(ctx.blockNumber),
        `Cannot deliver at block ${ctx.blockNumber}`,
      );

      this.deliveries.set(messageId, {
        processor: ctx.caller,
        deliveredAtBlock: ctx.blockNumber,
      });
      this.emit(ctx, {
        name: 'Process',
        messageId,
        processor: ctx.caller,
        blockNumber: ctx.blockNumber,
      });
      this.logger.info(
        { messageId, processor: ctx.caller, blockNumber: ctx.blockNumber },
        'Processed message',
      );
    });
  }

  delivered(messageId: MessageId): boolean {
    return this.deliveries.get(messageId).deliveredAtBlock > 0;
  }

  processor(messageId: MessageId): Address | undefined {
    return this.deliveries.get(messageId).processor;
  }

  processedAt(messageId: MessageId): number {
    return this.deliveries.get(messageId).deliveredAtBlock;
  }

  getDispatchFee(): Amount {
    return this.dispatchFee.get();
  }

  nonce(): number {
    return this.nonceSlot.get();
  }

  latestDispatchedId(): MessageId {
    return this.latestDispatchedIdSlot.get();
  }

  defaultIsm(): string {
    return this.defaultIsmSlot.get();
  }

  defaultHook(): string {
    return this.defaultHookSlot.get();
  }

  requiredHook(): string {
    return this.requiredHookSlot.get();
  }
}
