import type { Logger } from 'pino';

import {
  type Address,
  type Domain,
  assert,
  isNonNegativeInteger,
} from '@ichain/utils';

import { TokenNotRegisteredError } from '../errors.js';
import type { IMailbox } from '../interfaces/IMailbox.js';
import {
  type IRemoteMintHandler,
  isRemoteMintHandler,
} from '../interfaces/IRemoteMintHandler.js';
import type { MessageId } from '../messaging/message.js';
import { OwnableContract, assertSameChain } from '../runtime/Contract.js';
import type { CallContext, LocalChain } from '../runtime/LocalChain.js';
import type { StorageMap } from '../runtime/storage.js';
import { type TransferPayload, parseTransferPayload } from '../token/payload.js';

export interface InterchainTokenRouterOptions {
  address: Address;
  owner: Address;
  /** Domain this router receives transfers on */
  domain: Domain;
  mailbox: IMailbox;
  logger?: Logger;
}

/**
 * Receives bridging messages, marks them delivered on the mailbox and
 * credits the local InterchainToken.
 *
 * Inbound transfers always mint through the token registered for the
 * router's own domain, whichever domain the message comes from.
 */
export class InterchainTokenRouter extends OwnableContract {
  readonly localDomain: Domain;
  readonly mailbox: IMailbox;

  private readonly tokensByDomain: StorageMap<Domain, Address>;

  constructor(chain: LocalChain, options: InterchainTokenRouterOptions) {
    assert(
      isNonNegativeInteger(options.domain),
      `Invalid router domain ${options.domain}`,
    );
    assertSameChain(chain, options.mailbox, 'Mailbox');
    super(
      chain,
      options.address,
      options.owner,
      (options.logger ?? chain.logger).child({
        module: 'InterchainTokenRouter',
      }),
    );
    this.localDomain = options.domain;
    this.mailbox = options.mailbox;
    this.tokensByDomain = this.map<Domain, Address>('');
  }

  setTokenForDomain(
    ctx: CallContext,
    domainId: Domain,
    tokenName: Address,
  ): void {
    this.atomic(() => {
      this.onlyOwner(ctx);
      this.tokensByDomain.set(domainId, tokenName);
      this.emit(ctx, {
        name: 'TokenForDomainSet',
        domain: domainId,
        token: tokenName,
      });
    });
  }

  /**
   * @returns the registered token, or '' when none is registered
   */
  getTokenForDomain(domainId: Domain): Address {
    return this.tokensByDomain.get(domainId);
  }

  /**
   * Delivers a bridging message. The mailbox delivery mark is taken first,
   * so a replayed id fails before anything else happens; any later failure
   * reverts that mark together with the rest of the call.
   */
  process(ctx: CallContext, messageBody: string, messageId: MessageId): void {
    this.atomic(() => {
      this.mailbox.process(this.forward(ctx), messageBody, messageId);

      const payload: TransferPayload = parseTransferPayload(messageBody);
      this.emit(ctx, {
        name: 'RouterMessage',
        messageBody,
        senderDomain: payload.originDomain,
        senderAddress: payload.sender,
      });

      const token = this.resolveLocalToken();
      token.handleRemoteMint(
        this.forward(ctx),
        payload.sender,
        payload.recipient,
        payload.amount,
      );
      this.logger.info(
        {
          messageId,
          originDomain: payload.originDomain,
          token: token.address,
          recipient: payload.recipient,
          amount: payload.amount.toString(),
        },
        'Delivered inbound transfer',
      );
    });
  }

  private resolveLocalToken(): IRemoteMintHandler {
    const tokenName = this.tokensByDomain.get(this.localDomain);
    if (!tokenName) {
      throw new TokenNotRegisteredError(this.localDomain);
    }
    const contract = this.chain.getContract(tokenName);
    if (!contract || !isRemoteMintHandler(contract)) {
      throw new TokenNotRegisteredError(
        this.localDomain,
        `Token ${tokenName} is not deployed on domain ${this.chain.domain}`,
      );
    }
    return contract;
  }
}
