import {
  type Address,
  type Amount,
  type Domain,
  assert,
  isNonNegativeInteger,
} from '@ichain/utils';

import { UnauthorizedError } from '../errors.js';
import type { IMailbox } from '../interfaces/IMailbox.js';
import type { IRemoteMintHandler } from '../interfaces/IRemoteMintHandler.js';
import type { MessageId } from '../messaging/message.js';
import { assertSameChain } from '../runtime/Contract.js';
import type { CallContext, LocalChain } from '../runtime/LocalChain.js';

import { FungibleToken, type FungibleTokenOptions } from './FungibleToken.js';
import { encodeTransferPayload } from './payload.js';

/** Bookkeeping account holding everything burned for bridging */
export const BURN_ACCOUNT = 'BRIDGE_BURNED';

export const ONLY_ROUTER_MESSAGE =
  'Only the configured router can call this function.';

export interface InterchainTokenOptions extends FungibleTokenOptions {
  owner: Address;
  /** Domain this token is bridged from */
  domain: Domain;
  /** Local router, the only account allowed to mint */
  router: Address;
  mailbox: IMailbox;
  /** Router on the remote domains that receives outbound transfers */
  interchainRouter: Address;
}

/**
 * A bridgeable ledger: burns locally and dispatches a transfer instruction
 * on the way out, mints when its router delivers one on the way in.
 */
export class InterchainToken
  extends FungibleToken
  implements IRemoteMintHandler
{
  readonly owner: Address;
  readonly localDomain: Domain;
  readonly routerAddress: Address;
  readonly interchainRouterAddress: Address;

  private readonly mailbox: IMailbox;

  constructor(chain: LocalChain, options: InterchainTokenOptions) {
    assert(
      isNonNegativeInteger(options.domain),
      `Invalid token domain ${options.domain}`,
    );
    assertSameChain(chain, options.mailbox, 'Mailbox');
    super(chain, options, 'InterchainToken');
    this.owner = options.owner;
    this.localDomain = options.domain;
    this.routerAddress = options.router;
    this.mailbox = options.mailbox;
    this.interchainRouterAddress = options.interchainRouter;
  }

  burnedSupply(): Amount {
    return this.balanceOf(BURN_ACCOUNT);
  }

  mint(ctx: CallContext, to: Address, amount: Amount): void {
    this.atomic(() => {
      this.onlyRouter(ctx);
      this.requirePositive(amount);
      this.assertCanReceive(to);
      this.credit(to, amount);
      this.increaseSupply(amount);
      this.emit(ctx, { name: 'Mint', to, amount });
      this.logger.info({ to, amount: amount.toString() }, 'Minted');
    });
  }

  burn(ctx: CallContext, amount: Amount): void {
    this.atomic(() => {
      this.requirePositive(amount);
      this.assertCanSpend(ctx.caller);
      this.debit(ctx.caller, amount, 'Insufficient balance to burn.');
      this.credit(BURN_ACCOUNT, amount);
      this.emit(ctx, { name: 'Burn', from: ctx.caller, amount });
    });
  }

  /**
   * Burns `amount` from the caller and dispatches the transfer to the
   * remote router. The burned amount stays in flight until the message is
   * relayed and processed on `destinationDomain`; nothing refunds it.
   */
  xTransfer(
    ctx: CallContext,
    destinationDomain: Domain,
    recipient: Address,
    amount: Amount,
  ): MessageId {
    return this.atomic(() => {
      this.assertCanReceive(recipient);
      this.burn(ctx, amount);

      const messageBody = encodeTransferPayload({
        sender: ctx.caller,
        recipient,
        amount,
        originDomain: this.localDomain,
      });
      const messageId = this.mailbox.dispatch(
        this.forward(ctx),
        destinationDomain,
        this.interchainRouterAddress,
        messageBody,
      );

      this.emit(ctx, {
        name: 'RemoteTransfer',
        originDomain: this.localDomain,
        destinationDomain,
        sender: ctx.caller,
        recipient,
        amount,
        messageId,
      });
      this.logger.info(
        {
          messageId,
          sender: ctx.caller,
          recipient,
          destinationDomain,
          amount: amount.toString(),
        },
        'Sent remote transfer',
      );
      return messageId;
    });
  }

  /**
   * Credits an inbound transfer. Delivery is checked by the router before
   * it calls in, not here.
   */
  handleRemoteMint(
    ctx: CallContext,
    sender: Address,
    recipient: Address,
    amount: Amount,
  ): void {
    this.atomic(() => {
      this.onlyRouter(ctx);
      this.requirePositive(amount);
      this.assertCanReceive(recipient);
      this.credit(recipient, amount);
      this.increaseSupply(amount);
      this.emit(ctx, { name: 'ReceiveRemoteTransfer', sender, amount });
      this.logger.info(
        { sender, recipient, amount: amount.toString() },
        'Received remote transfer',
      );
    });
  }

  protected override assertCanSpend(account: Address): void {
    if (account === BURN_ACCOUNT) {
      throw new UnauthorizedError(`${BURN_ACCOUNT} balance is not spendable`);
    }
  }

  protected override assertCanReceive(account: Address): void {
    if (account === BURN_ACCOUNT) {
      throw new UnauthorizedError(`${BURN_ACCOUNT} only receives burns`);
    }
  }

  private onlyRouter(ctx: CallContext): void {
    if (ctx.caller !== this.routerAddress) {
      throw new UnauthorizedError(ONLY_ROUTER_MESSAGE);
    }
  }
}
