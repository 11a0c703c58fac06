import type { Address, Domain } from '@ichain/utils';

import type { MessageId } from '../messaging/message.js';
import type { CallContext, LocalChain } from '../runtime/LocalChain.js';

export interface IMailbox {
  readonly address: Address;
  readonly chain: LocalChain;
  readonly localDomain: Domain;
  dispatch(
    ctx: CallContext,
    destinationDomain: Domain,
    recipientAddress: Address,
    messageBody: string,
  ): MessageId;
  process(ctx: CallContext, metadata: string, messageId: MessageId): void;
  delivered(messageId: MessageId): boolean;
}
