export {
  AlreadyDeliveredError,
  BridgeError,
  InsufficientFundsError,
  InvalidAmountError,
  MessageFormatError,
  TokenNotRegisteredError,
  UnauthorizedError,
} from './errors.js';
export type {
  BridgeEvent,
  BridgeEventName,
  DispatchEvent,
  ProcessEvent,
  ReceiveRemoteTransferEvent,
  RemoteTransferEvent,
} from './events.js';
export type { IFungibleLedger } from './interfaces/IFungibleLedger.js';
export type { IMailbox } from './interfaces/IMailbox.js';
export {
  type IRemoteMintHandler,
  isRemoteMintHandler,
} from './interfaces/IRemoteMintHandler.js';
export {
  DEFAULT_HOOK,
  DEFAULT_ISM,
  DEFAULT_REQUIRED_HOOK,
  type DeliveryRecord,
  Mailbox,
  type MailboxOptions,
} from './mailbox/Mailbox.js';
export {
  MESSAGE_VERSION,
  type Message,
  type MessageId,
  buildMessage,
  deriveId,
  formatMessage,
} from './messaging/message.js';
export {
  InterchainTokenRouter,
  type InterchainTokenRouterOptions,
} from './router/InterchainTokenRouter.js';
export {
  Contract,
  ONLY_OWNER_MESSAGE,
  OwnableContract,
  assertSameChain,
} from './runtime/Contract.js';
export { EventLog, type LoggedEvent } from './runtime/EventLog.js';
export {
  type CallContext,
  DEFAULT_LOCAL_DOMAIN,
  type ExecuteOptions,
  LocalChain,
  type LocalChainOptions,
} from './runtime/LocalChain.js';
export { StateJournal, type JournalMark } from './runtime/StateJournal.js';
export { StorageMap, StorageValue, compositeKey } from './runtime/storage.js';
export {
  FungibleToken,
  type FungibleTokenOptions,
} from './token/FungibleToken.js';
export {
  BURN_ACCOUNT,
  InterchainToken,
  type InterchainTokenOptions,
  ONLY_ROUTER_MESSAGE,
} from './token/InterchainToken.js';
export {
  PAYLOAD_SEPARATOR,
  type TransferPayload,
  encodeTransferPayload,
  parseTransferPayload,
  tryParseTransferPayload,
} from './token/payload.js';
