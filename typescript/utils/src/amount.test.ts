import { expect } from 'chai';

import {
  formatAmount,
  isPositiveAmount,
  parseUnsignedAmount,
  tryParseAmount,
} from './amount.js';

describe('tryParseAmount', () => {
  it('parses numbers and numeric strings', () => {
    expect(tryParseAmount('123.45')?.toString()).to.equal('123.45');
    expect(tryParseAmount(7)?.toString()).to.equal('7');
  });

  it('returns null for empty or invalid input', () => {
    expect(tryParseAmount(null)).to.be.null;
    expect(tryParseAmount('')).to.be.null;
    expect(tryParseAmount('abc')).to.be.null;
    expect(tryParseAmount('Infinity')).to.be.null;
  });

  it('keeps zero', () => {
    expect(tryParseAmount('0')?.toString()).to.equal('0');
  });
});

describe('parseUnsignedAmount', () => {
  it('parses integer strings into bigint', () => {
    expect(parseUnsignedAmount('100')).to.equal(100n);
    expect(parseUnsignedAmount('0')).to.equal(0n);
    expect(parseUnsignedAmount('  42 ')).to.equal(42n);
  });

  it('keeps precision beyond the float range', () => {
    expect(parseUnsignedAmount('123456789012345678901234567890')).to.equal(
      123456789012345678901234567890n,
    );
  });

  it('accepts a zero fractional part', () => {
    expect(parseUnsignedAmount('100.000')).to.equal(100n);
  });

  it('rejects signed, fractional and malformed values', () => {
    expect(parseUnsignedAmount('-5')).to.be.null;
    expect(parseUnsignedAmount('+5')).to.be.null;
    expect(parseUnsignedAmount('1.5')).to.be.null;
    expect(parseUnsignedAmount('1e3')).to.be.null;
    expect(parseUnsignedAmount('ten')).to.be.null;
    expect(parseUnsignedAmount('')).to.be.null;
  });
});

describe('formatAmount', () => {
  it('writes plain base-10 digits', () => {
    expect(formatAmount(1000000n)).to.equal('1000000');
  });
});

describe('isPositiveAmount', () => {
  it('is true only above zero', () => {
    expect(isPositiveAmount(1n)).to.be.true;
    expect(isPositiveAmount(0n)).to.be.false;
    expect(isPositiveAmount(-1n)).to.be.false;
  });
});
