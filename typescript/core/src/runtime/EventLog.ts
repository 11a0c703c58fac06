import type { Address } from '@ichain/utils';

import type { StateJournal } from './StateJournal.js';

export interface LoggedEvent<E> {
  /** Emitting contract */
  address: Address;
  /** Height of the call that emitted the event */
  blockNumber: number;
  /** Position in the chain-wide log */
  index: number;
  event: E;
}

/**
 * Append-only event log. Appends made inside a reverted call are dropped.
 */
export class EventLog<E extends { name: string }> {
  private readonly entries: LoggedEvent<E>[] = [];

  constructor(private readonly journal: StateJournal) {}

  append(address: Address, blockNumber: number, event: E): LoggedEvent<E> {
    const entry: LoggedEvent<E> = {
      address,
      blockNumber,
      index: this.entries.length,
      event,
    };
    this.entries.push(entry);
    this.journal.record(() => {
      this.entries.length = entry.index;
    });
    return entry;
  }

  all(): LoggedEvent<E>[] {
    return [...this.entries];
  }

  filter<N extends E['name']>(
    name: N,
    address?: Address,
  ): LoggedEvent<Extract<E, { name: N }>>[] {
    return this.entries.filter(
      (entry): entry is LoggedEvent<Extract<E, { name: N }>> =>
        entry.event.name === name &&
        (address === undefined || entry.address === address),
    );
  }

  get length(): number {
    return this.entries.length;
  }
}
