import type { Logger } from 'pino';

import {
  type Address,
  type Domain,
  assert,
  isNonNegativeInteger,
  isPositiveInteger,
  rootLogger,
} from '@ichain/utils';

import type { BridgeEvent } from '../events.js';

import type { Contract } from './Contract.js';
import { EventLog } from './EventLog.js';
import { StateJournal } from './StateJournal.js';

// Domain a mailbox reports when none is configured
export const DEFAULT_LOCAL_DOMAIN: Domain = 517164068468;

/**
 * Caller and height of the call being executed. Contracts never read an
 * ambient caller; every mutating operation receives its context.
 */
export interface CallContext {
  readonly caller: Address;
  readonly blockNumber: number;
}

export interface LocalChainOptions {
  domain?: Domain;
  blockNumber?: number;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Overrides the height seen by the call, e.g. to replay a relayed block */
  blockNumber?: number;
}

/**
 * In-process stand-in for the ledger host of one domain.
 *
 * Calls run one at a time to completion. `transact` wraps a call in a
 * journal checkpoint so a throwing call leaves no state or event behind.
 */
export class LocalChain {
  readonly domain: Domain;
  readonly journal = new StateJournal();
  readonly events: EventLog<BridgeEvent>;
  readonly logger: Logger;

  private currentBlock: number;
  private readonly contracts = new Map<Address, Contract>();

  constructor({
    domain = DEFAULT_LOCAL_DOMAIN,
    blockNumber = 1,
    logger = rootLogger,
  }: LocalChainOptions = {}) {
    assert(isNonNegativeInteger(domain), `Invalid domain ${domain}`);
    assert(isPositiveInteger(blockNumber), `Invalid block ${blockNumber}`);
    this.domain = domain;
    this.currentBlock = blockNumber;
    this.events = new EventLog<BridgeEvent>(this.journal);
    this.logger = logger.child({ module: 'LocalChain', domain });
  }

  get blockNumber(): number {
    return this.currentBlock;
  }

  mine(blocks = 1): number {
    assert(isPositiveInteger(blocks), `Cannot mine ${blocks} blocks`);
    this.currentBlock += blocks;
    return this.currentBlock;
  }

  register<C extends Contract>(contract: C): C {
    assert(
      !this.contracts.has(contract.address),
      `Contract ${contract.address} already deployed on domain ${this.domain}`,
    );
    this.contracts.set(contract.address, contract);
    this.logger.debug({ address: contract.address }, 'Registered contract');
    return contract;
  }

  getContract(address: Address): Contract | undefined {
    return this.contracts.get(address);
  }

  context(caller: Address, blockNumber = this.currentBlock): CallContext {
    assert(caller.length > 0, 'Caller must not be empty');
    assert(isPositiveInteger(blockNumber), `Invalid block ${blockNumber}`);
    return { caller, blockNumber };
  }

  /**
   * Runs `fn` as a top-level call signed by `signer`.
   */
  execute<T>(
    signer: Address,
    fn: (ctx: CallContext) => T,
    { blockNumber }: ExecuteOptions = {},
  ): T {
    const ctx = this.context(signer, blockNumber);
    return this.transact(() => fn(ctx));
  }

  transact<T>(fn: () => T): T {
    const mark = this.journal.checkpoint();
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.journal.revertTo(mark);
      this.logger.debug({ err: error }, 'Call reverted');
      throw error;
    }
    this.journal.release(mark);
    return result;
  }
}
