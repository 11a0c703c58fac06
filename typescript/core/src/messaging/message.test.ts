import { expect } from 'chai';
import { ethers } from 'ethers';

import { MessageFormatError } from '../errors.js';

import {
  MESSAGE_VERSION,
  buildMessage,
  deriveId,
  formatMessage,
} from './message.js';

const ID_PATTERN = /^0x[0-9a-f]{64}$/;

describe('message codec', () => {
  const base = buildMessage(1, 'user1', 9999, 'someRecipient', 'hello', 0);

  describe('buildMessage', () => {
    it('fills the current protocol version by default', () => {
      expect(base).to.deep.equal({
        version: MESSAGE_VERSION,
        nonce: 0,
        originDomain: 1,
        sender: 'user1',
        destinationDomain: 9999,
        recipient: 'someRecipient',
        body: 'hello',
      });
    });
  });

  describe('formatMessage', () => {
    it('decodes back into the original fields', () => {
      const [version, nonce, origin, sender, destination, recipient, body] =
        ethers.utils.defaultAbiCoder.decode(
          ['uint8', 'uint32', 'uint64', 'string', 'uint64', 'string', 'string'],
          formatMessage(base),
        );
      expect(version).to.equal(1);
      expect(nonce).to.equal(0);
      expect(origin.toNumber()).to.equal(1);
      expect(sender).to.equal('user1');
      expect(destination.toNumber()).to.equal(9999);
      expect(recipient).to.equal('someRecipient');
      expect(body).to.equal('hello');
    });

    it('accepts domains wider than 32 bits', () => {
      const message = { ...base, originDomain: 517164068468 };
      expect(() => formatMessage(message)).to.not.throw();
    });

    it('rejects out-of-range fields', () => {
      expect(() => formatMessage({ ...base, nonce: -1 })).to.throw(
        MessageFormatError,
        'Invalid message nonce: -1',
      );
      expect(() => formatMessage({ ...base, nonce: 2 ** 32 })).to.throw(
        MessageFormatError,
      );
      expect(() => formatMessage({ ...base, version: 256 })).to.throw(
        MessageFormatError,
      );
      expect(() => formatMessage({ ...base, destinationDomain: 1.5 })).to.throw(
        MessageFormatError,
        'Invalid message destination domain: 1.5',
      );
    });
  });

  describe('deriveId', () => {
    it('returns a 32-byte hex id', () => {
      expect(deriveId(base)).to.match(ID_PATTERN);
    });

    it('is deterministic for identical fields', () => {
      const copy = buildMessage(1, 'user1', 9999, 'someRecipient', 'hello', 0);
      expect(deriveId(copy)).to.equal(deriveId(base));
    });

    it('changes when only the nonce changes', () => {
      expect(deriveId({ ...base, nonce: 1 })).to.not.equal(deriveId(base));
    });

    it('changes when any other field changes', () => {
      const id = deriveId(base);
      expect(deriveId({ ...base, version: 2 })).to.not.equal(id);
      expect(deriveId({ ...base, originDomain: 2 })).to.not.equal(id);
      expect(deriveId({ ...base, sender: 'user2' })).to.not.equal(id);
      expect(deriveId({ ...base, destinationDomain: 1 })).to.not.equal(id);
      expect(deriveId({ ...base, recipient: 'other' })).to.not.equal(id);
      expect(deriveId({ ...base, body: 'hello!' })).to.not.equal(id);
    });

    it('does not collide when separators move between fields', () => {
      const left = buildMessage(1, 'a-b', 2, 'c', 'x', 0);
      const right = buildMessage(1, 'a', 2, 'b-c', 'x', 0);
      expect(deriveId(left)).to.not.equal(deriveId(right));

      const bodyShift = buildMessage(1, 'a', 2, 'b', '-c', 0);
      const recipientShift = buildMessage(1, 'a', 2, 'b-', 'c', 0);
      expect(deriveId(bodyShift)).to.not.equal(deriveId(recipientShift));
    });

    it('is the keccak256 of the canonical encoding', () => {
      expect(deriveId(base)).to.equal(
        ethers.utils.keccak256(formatMessage(base)),
      );
    });
  });
});
