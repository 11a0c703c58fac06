import {
  type Address,
  type Amount,
  type Domain,
  type Result,
  failure,
  formatAmount,
  isNonNegativeInteger,
  parseUnsignedAmount,
  success,
  unwrapResult,
} from '@ichain/utils';

import { MessageFormatError } from '../errors.js';

export const PAYLOAD_SEPARATOR = '|';
const PAYLOAD_FIELD_COUNT = 4;
const DOMAIN_PATTERN = /^[0-9]+$/;

/**
 * Bridging instruction carried in a message body as
 * `sender|recipient|amount|originDomain`.
 */
export interface TransferPayload {
  sender: Address;
  recipient: Address;
  amount: Amount;
  originDomain: Domain;
}

export function encodeTransferPayload(payload: TransferPayload): string {
  const { sender, recipient, amount, originDomain } = payload;
  for (const [field, value] of [
    ['sender', sender],
    ['recipient', recipient],
  ]) {
    if (value.includes(PAYLOAD_SEPARATOR)) {
      throw new MessageFormatError(
        `Transfer ${field} must not contain '${PAYLOAD_SEPARATOR}'`,
      );
    }
  }
  if (amount < 0n) {
    throw new MessageFormatError('Transfer amount must not be negative');
  }
  if (!isNonNegativeInteger(originDomain)) {
    throw new MessageFormatError(`Invalid origin domain ${originDomain}`);
  }
  return [sender, recipient, formatAmount(amount), originDomain].join(
    PAYLOAD_SEPARATOR,
  );
}

export function tryParseTransferPayload(body: string): Result<TransferPayload> {
  const parts = body.split(PAYLOAD_SEPARATOR);
  if (parts.length !== PAYLOAD_FIELD_COUNT) {
    return failure('Invalid message format.');
  }
  const [sender, recipient, amountField, domainField] = parts;

  const amount = parseUnsignedAmount(amountField);
  if (amount === null) {
    return failure(`Invalid transfer amount '${amountField}'`);
  }

  const originDomain = Number(domainField);
  if (!DOMAIN_PATTERN.test(domainField) || !isNonNegativeInteger(originDomain)) {
    return failure(`Invalid origin domain '${domainField}'`);
  }

  return success({ sender, recipient, amount, originDomain });
}

export function parseTransferPayload(body: string): TransferPayload {
  return unwrapResult(
    tryParseTransferPayload(body),
    (message) => new MessageFormatError(message),
  );
}
