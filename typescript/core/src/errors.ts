import type { Domain } from '@ichain/utils';

/**
 * Base class for every error a bridge contract raises on purpose.
 * A thrown BridgeError always means the call was reverted in full.
 */
export class BridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends BridgeError {}

export class InsufficientFundsError extends BridgeError {}

export class InvalidAmountError extends BridgeError {}

export class AlreadyDeliveredError extends BridgeError {
  constructor(public readonly messageId: string) {
    super('Mailbox: already delivered');
  }
}

export class MessageFormatError extends BridgeError {}

export class TokenNotRegisteredError extends BridgeError {
  constructor(
    public readonly domain: Domain,
    message = 'No InterchainToken configured for this domain.',
  ) {
    super(message);
  }
}
