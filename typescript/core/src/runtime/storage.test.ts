import { expect } from 'chai';

import { StateJournal } from './StateJournal.js';
import { StorageMap, StorageValue, compositeKey } from './storage.js';

describe('journaled storage', () => {
  let journal: StateJournal;

  beforeEach(() => {
    journal = new StateJournal();
  });

  describe('StorageValue', () => {
    it('restores the previous value on revert', () => {
      const slot = new StorageValue(journal, 'a');
      const mark = journal.checkpoint();
      slot.set('b');
      slot.set('c');
      journal.revertTo(mark);
      expect(slot.get()).to.equal('a');
    });

    it('does not journal writes made outside a checkpoint', () => {
      const slot = new StorageValue(journal, 1);
      slot.set(2);
      const mark = journal.checkpoint();
      journal.revertTo(mark);
      expect(slot.get()).to.equal(2);
    });
  });

  describe('StorageMap', () => {
    it('returns the default for unset keys', () => {
      const map = new StorageMap<string, bigint>(journal, 0n);
      expect(map.get('nobody')).to.equal(0n);
      expect(map.has('nobody')).to.be.false;
      expect(map.size).to.equal(0);
    });

    it('undoes updates and insertions on revert', () => {
      const map = new StorageMap<string, bigint>(journal, 0n);
      map.set('alice', 5n);

      const mark = journal.checkpoint();
      map.update('alice', (v) => v + 10n);
      map.set('bob', 1n);
      expect(map.get('alice')).to.equal(15n);
      journal.revertTo(mark);

      expect(map.get('alice')).to.equal(5n);
      expect(map.has('bob')).to.be.false;
      expect(map.size).to.equal(1);
    });

    it('keeps writes once the outermost checkpoint is released', () => {
      const map = new StorageMap<number, string>(journal, '');
      const outer = journal.checkpoint();
      const inner = journal.checkpoint();
      map.set(1, 'token');
      journal.release(inner);
      expect(journal.inTransaction).to.be.true;
      journal.release(outer);
      expect(journal.inTransaction).to.be.false;
      expect(map.get(1)).to.equal('token');
    });

    it('supports composite keys', () => {
      const map = new StorageMap<[string, string], bigint>(
        journal,
        0n,
        compositeKey,
      );
      map.set(['owner', 'spender'], 3n);
      expect(map.get(['owner', 'spender'])).to.equal(3n);
      expect(map.get(['spender', 'owner'])).to.equal(0n);
    });
  });

  describe('compositeKey', () => {
    it('does not collide when a separator moves between parts', () => {
      expect(compositeKey(['a|b', 'c'])).to.not.equal(
        compositeKey(['a', 'b|c']),
      );
      expect(compositeKey(['a,b', 'c'])).to.not.equal(
        compositeKey(['a', 'b,c']),
      );
    });
  });

  describe('StateJournal', () => {
    it('refuses to revert without a checkpoint', () => {
      expect(() => journal.revertTo(0)).to.throw('No open checkpoint to revert');
    });

    it('refuses to release without a checkpoint', () => {
      expect(() => journal.release(0)).to.throw(
        'No open checkpoint to release',
      );
    });
  });
});
