import type { Address, Amount, Domain } from '@ichain/utils';

import type { MessageId } from './messaging/message.js';

export type DispatchEvent = {
  name: 'Dispatch';
  sender: Address;
  originDomain: Domain;
  destinationDomain: Domain;
  recipient: Address;
  messageId: MessageId;
  nonce: number;
};

export type ProcessEvent = {
  name: 'Process';
  messageId: MessageId;
  processor: Address;
  blockNumber: number;
};

export type MailboxConfigEvent =
  | { name: 'DefaultIsmSet'; module: string }
  | { name: 'DefaultHookSet'; hook: string }
  | { name: 'RequiredHookSet'; hook: string }
  | { name: 'DispatchFeeSet'; amount: Amount };

export type TokenEvent =
  | { name: 'Transfer'; from: Address; to: Address; amount: Amount }
  | { name: 'Approval'; owner: Address; spender: Address; amount: Amount }
  | { name: 'Mint'; to: Address; amount: Amount }
  | { name: 'Burn'; from: Address; amount: Amount };

export type RemoteTransferEvent = {
  name: 'RemoteTransfer';
  originDomain: Domain;
  destinationDomain: Domain;
  sender: Address;
  recipient: Address;
  amount: Amount;
  messageId: MessageId;
};

export type ReceiveRemoteTransferEvent = {
  name: 'ReceiveRemoteTransfer';
  sender: Address;
  amount: Amount;
};

export type RouterEvent =
  | {
      name: 'RouterMessage';
      messageBody: string;
      senderDomain: Domain;
      senderAddress: Address;
    }
  | { name: 'TokenForDomainSet'; domain: Domain; token: Address };

/**
 * Every event a contract on a LocalChain can emit.
 */
export type BridgeEvent =
  | DispatchEvent
  | ProcessEvent
  | MailboxConfigEvent
  | TokenEvent
  | RemoteTransferEvent
  | ReceiveRemoteTransferEvent
  | RouterEvent;

export type BridgeEventName = BridgeEvent['name'];
