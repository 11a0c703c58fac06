import { assert } from '@ichain/utils';

export type JournalMark = number;

/**
 * Undo log backing every journaled storage slot on a chain.
 *
 * Writes made while no checkpoint is open (e.g. constructor seeding) are not
 * recorded. Checkpoints nest; the log is cleared once the outermost one is
 * released.
 */
export class StateJournal {
  private readonly undoLog: Array<() => void> = [];
  private depth = 0;

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  checkpoint(): JournalMark {
    this.depth++;
    return this.undoLog.length;
  }

  record(undo: () => void): void {
    if (!this.inTransaction) return;
    this.undoLog.push(undo);
  }

  revertTo(mark: JournalMark): void {
    assert(this.inTransaction, 'No open checkpoint to revert');
    assert(mark <= this.undoLog.length, `Unknown journal mark ${mark}`);
    for (let i = this.undoLog.length - 1; i >= mark; i--) {
      this.undoLog[i]();
    }
    this.undoLog.length = mark;
    this.close();
  }

  release(mark: JournalMark): void {
    assert(this.inTransaction, 'No open checkpoint to release');
    assert(mark <= this.undoLog.length, `Unknown journal mark ${mark}`);
    this.close();
  }

  private close(): void {
    this.depth--;
    if (this.depth === 0) this.undoLog.length = 0;
  }
}
