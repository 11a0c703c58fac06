import type { Logger } from 'pino';

import { type Address, type Amount, isPositiveAmount } from '@ichain/utils';

import { InsufficientFundsError, InvalidAmountError } from '../errors.js';
import type { IFungibleLedger } from '../interfaces/IFungibleLedger.js';
import { Contract } from '../runtime/Contract.js';
import type { CallContext, LocalChain } from '../runtime/LocalChain.js';
import {
  type StorageMap,
  type StorageValue,
  compositeKey,
} from '../runtime/storage.js';

export interface FungibleTokenOptions {
  address: Address;
  /** Genesis balances, booked without events */
  initialBalances?: Record<Address, Amount>;
  logger?: Logger;
}

/**
 * Conventional balance/allowance ledger. Used directly as a fee currency
 * and as the base of InterchainToken.
 */
export class FungibleToken extends Contract implements IFungibleLedger {
  protected readonly balances: StorageMap<Address, Amount>;
  protected readonly allowances: StorageMap<[Address, Address], Amount>;
  private readonly supply: StorageValue<Amount>;

  constructor(
    chain: LocalChain,
    options: FungibleTokenOptions,
    module = 'FungibleToken',
  ) {
    const genesis = Object.entries(options.initialBalances ?? {});
    for (const [account, amount] of genesis) {
      if (amount < 0n) {
        throw new InvalidAmountError(`Negative genesis balance for ${account}`);
      }
    }
    super(
      chain,
      options.address,
      (options.logger ?? chain.logger).child({ module }),
    );
    this.balances = this.map<Address, Amount>(0n);
    this.allowances = this.map<[Address, Address], Amount>(0n, compositeKey);
    this.supply = this.value(0n);

    for (const [account, amount] of genesis) {
      this.balances.set(account, amount);
      this.supply.set(this.supply.get() + amount);
    }
  }

  balanceOf(account: Address): Amount {
    return this.balances.get(account);
  }

  allowance(owner: Address, spender: Address): Amount {
    return this.allowances.get([owner, spender]);
  }

  /**
   * Every unit ever booked on this ledger, including amounts parked in
   * bookkeeping accounts.
   */
  totalSupply(): Amount {
    return this.supply.get();
  }

  transfer(ctx: CallContext, amount: Amount, to: Address): void {
    this.atomic(() => {
      this.requirePositive(amount);
      this.assertCanSpend(ctx.caller);
      this.assertCanReceive(to);
      this.debit(ctx.caller, amount, 'Not enough coins to send!');
      this.credit(to, amount);
      this.emit(ctx, { name: 'Transfer', from: ctx.caller, to, amount });
    });
  }

  /**
   * Raises the allowance `to` may spend on behalf of the caller by `amount`.
   * Allowances accumulate; they are never overwritten.
   * @returns the new allowance
   */
  approve(ctx: CallContext, amount: Amount, to: Address): Amount {
    return this.atomic(() => {
      this.requirePositive(amount);
      this.assertCanSpend(ctx.caller);
      const allowance = this.allowances.update(
        [ctx.caller, to],
        (current) => current + amount,
      );
      this.emit(ctx, {
        name: 'Approval',
        owner: ctx.caller,
        spender: to,
        amount: allowance,
      });
      return allowance;
    });
  }

  transferFrom(
    ctx: CallContext,
    amount: Amount,
    to: Address,
    mainAccount: Address,
  ): void {
    this.atomic(() => {
      this.requirePositive(amount);
      this.assertCanSpend(mainAccount);
      this.assertCanReceive(to);

      const approved = this.allowance(mainAccount, ctx.caller);
      if (approved < amount) {
        throw new InsufficientFundsError(
          `Not enough coins approved to send! You have ${approved} and are trying to spend ${amount}`,
        );
      }
      this.allowances.set([mainAccount, ctx.caller], approved - amount);
      this.debit(mainAccount, amount, 'Not enough coins to send!');
      this.credit(to, amount);
      this.emit(ctx, { name: 'Transfer', from: mainAccount, to, amount });
    });
  }

  /**
   * Hook for accounts that may hold a balance but never move it.
   */
  protected assertCanSpend(_account: Address): void {}

  protected assertCanReceive(_account: Address): void {}

  protected requirePositive(amount: Amount): void {
    if (!isPositiveAmount(amount)) {
      throw new InvalidAmountError('Cannot send negative balances!');
    }
  }

  protected debit(account: Address, amount: Amount, message: string): void {
    const balance = this.balances.get(account);
    if (balance < amount) {
      this.logger.debug(
        { account, balance: balance.toString(), amount: amount.toString() },
        'Insufficient balance',
      );
      throw new InsufficientFundsError(message);
    }
    this.balances.set(account, balance - amount);
  }

  protected credit(account: Address, amount: Amount): void {
    this.balances.set(account, this.balances.get(account) + amount);
  }

  protected increaseSupply(amount: Amount): void {
    this.supply.set(this.supply.get() + amount);
  }
}
