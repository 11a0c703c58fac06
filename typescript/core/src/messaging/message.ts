import { ethers } from 'ethers';

import {
  type Address,
  type Domain,
  type HexString,
  isNonNegativeInteger,
} from '@ichain/utils';

import { MessageFormatError } from '../errors.js';

export const MESSAGE_VERSION = 1;

const MAX_UINT8 = 2 ** 8 - 1;
const MAX_UINT32 = 2 ** 32 - 1;

/**
 * ABI layout of the canonical message encoding. Strings are length-prefixed,
 * so no field value can bleed into its neighbour.
 */
const MESSAGE_ABI_TYPES = [
  'uint8', // version
  'uint32', // nonce
  'uint64', // originDomain
  'string', // sender
  'uint64', // destinationDomain
  'string', // recipient
  'string', // body
];

export type MessageId = HexString;

export interface Message {
  version: number;
  nonce: number;
  originDomain: Domain;
  sender: Address;
  destinationDomain: Domain;
  recipient: Address;
  body: string;
}

export function buildMessage(
  originDomain: Domain,
  sender: Address,
  destinationDomain: Domain,
  recipient: Address,
  body: string,
  nonce: number,
  version: number = MESSAGE_VERSION,
): Message {
  return {
    version,
    nonce,
    originDomain,
    sender,
    destinationDomain,
    recipient,
    body,
  };
}

function checkInteger(field: string, value: number, max: number): void {
  if (!isNonNegativeInteger(value) || value > max) {
    throw new MessageFormatError(`Invalid message ${field}: ${value}`);
  }
}

/**
 * Canonical byte encoding of a message
 * @returns Hex string of the ABI-encoded fields
 */
export function formatMessage(message: Message): HexString {
  checkInteger('version', message.version, MAX_UINT8);
  checkInteger('nonce', message.nonce, MAX_UINT32);
  checkInteger('origin domain', message.originDomain, Number.MAX_SAFE_INTEGER);
  checkInteger(
    'destination domain',
    message.destinationDomain,
    Number.MAX_SAFE_INTEGER,
  );

  return ethers.utils.defaultAbiCoder.encode(MESSAGE_ABI_TYPES, [
    message.version,
    message.nonce,
    message.originDomain,
    message.sender,
    message.destinationDomain,
    message.recipient,
    message.body,
  ]);
}

/**
 * Get the ID of a message
 * @returns keccak256 of the canonical encoding, 0x-prefixed
 */
export function deriveId(message: Message): MessageId {
  return ethers.utils.keccak256(formatMessage(message));
}
