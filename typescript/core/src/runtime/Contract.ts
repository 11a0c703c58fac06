import type { Logger } from 'pino';

import { type Address, assert } from '@ichain/utils';

import { UnauthorizedError } from '../errors.js';
import type { BridgeEvent } from '../events.js';

import type { CallContext, LocalChain } from './LocalChain.js';
import { StorageMap, StorageValue } from './storage.js';

export const ONLY_OWNER_MESSAGE =
  'Only the contract owner can call this method.';

/**
 * Fails unless `dependency` lives on `chain`. A contract on another chain
 * writes through another journal, so a revert here could not undo it.
 */
export function assertSameChain(
  chain: LocalChain,
  dependency: { readonly address: Address; readonly chain: LocalChain },
  role: string,
): void {
  assert(
    dependency.chain === chain,
    `${role} ${dependency.address} is not deployed on domain ${chain.domain}`,
  );
}

/**
 * Base for everything deployed on a LocalChain. Registers itself with the
 * chain under `address` on construction, so subclasses validate their
 * options before calling `super`.
 */
export abstract class Contract {
  protected readonly logger: Logger;

  constructor(
    readonly chain: LocalChain,
    readonly address: Address,
    logger: Logger,
  ) {
    this.logger = logger.child({ address });
    chain.register(this);
  }

  protected atomic<T>(fn: () => T): T {
    return this.chain.transact(fn);
  }

  /**
   * Context for a call made by this contract into another one.
   */
  protected forward(ctx: CallContext): CallContext {
    return { caller: this.address, blockNumber: ctx.blockNumber };
  }

  protected emit(ctx: CallContext, event: BridgeEvent): void {
    this.chain.events.append(this.address, ctx.blockNumber, event);
  }

  protected value<T>(initial: T): StorageValue<T> {
    return new StorageValue(this.chain.journal, initial);
  }

  protected map<K, V>(
    defaultValue: V,
    toKey?: (key: K) => string,
  ): StorageMap<K, V> {
    return new StorageMap<K, V>(this.chain.journal, defaultValue, toKey);
  }
}

/**
 * A contract with a single owner fixed at deployment.
 */
export abstract class OwnableContract extends Contract {
  private readonly ownerSlot: StorageValue<Address>;

  constructor(
    chain: LocalChain,
    address: Address,
    owner: Address,
    logger: Logger,
  ) {
    super(chain, address, logger);
    this.ownerSlot = this.value(owner);
  }

  owner(): Address {
    return this.ownerSlot.get();
  }

  protected onlyOwner(ctx: CallContext): void {
    if (ctx.caller !== this.ownerSlot.get()) {
      this.logger.warn({ caller: ctx.caller }, 'Rejected non-owner call');
      throw new UnauthorizedError(ONLY_OWNER_MESSAGE);
    }
  }
}
