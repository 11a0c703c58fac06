import { pino } from 'pino';

import type { Address, Amount, Domain } from '@ichain/utils';

import { Mailbox } from '../mailbox/Mailbox.js';
import { InterchainTokenRouter } from '../router/InterchainTokenRouter.js';
import { DEFAULT_LOCAL_DOMAIN, LocalChain } from '../runtime/LocalChain.js';
import { FungibleToken } from '../token/FungibleToken.js';
import { InterchainToken } from '../token/InterchainToken.js';

export const testLogger = pino({ level: 'silent' });

export const OWNER = 'sys';
export const CURRENCY = 'currency';
export const MAILBOX = 'con_mailbox';
export const TOKEN = 'con_interchain_token';
export const ROUTER = 'con_interchain_router';

export const ID_PATTERN = /^0x[0-9a-f]{64}$/;

export interface BridgeDomain {
  chain: LocalChain;
  currency: FungibleToken;
  mailbox: Mailbox;
  token: InterchainToken;
  router: InterchainTokenRouter;
}

export interface BridgeDomainOptions {
  /** Domain of the chain, its mailbox and its router */
  domain?: Domain;
  /** Domain the token reports as transfer origin, defaults to `domain` */
  tokenDomain?: Domain;
  tokenBalances?: Record<Address, Amount>;
  currencyBalances?: Record<Address, Amount>;
  /** Register the token for the router's own domain (default true) */
  registerToken?: boolean;
}

/**
 * Deploys a fee currency, mailbox, router and token on a fresh chain,
 * all owned by OWNER.
 */
export function deployBridgeDomain(
  options: BridgeDomainOptions = {},
): BridgeDomain {
  const domain = options.domain ?? DEFAULT_LOCAL_DOMAIN;
  const chain = new LocalChain({ domain, logger: testLogger });
  const currency = new FungibleToken(chain, {
    address: CURRENCY,
    initialBalances: options.currencyBalances ?? {
      [OWNER]: 1000n,
      user1: 1000n,
      user2: 1000n,
    },
    logger: testLogger,
  });
  const mailbox = new Mailbox(chain, {
    address: MAILBOX,
    owner: OWNER,
    feeToken: currency,
    logger: testLogger,
  });
  const router = new InterchainTokenRouter(chain, {
    address: ROUTER,
    owner: OWNER,
    domain,
    mailbox,
    logger: testLogger,
  });
  const token = new InterchainToken(chain, {
    address: TOKEN,
    owner: OWNER,
    domain: options.tokenDomain ?? domain,
    router: ROUTER,
    mailbox,
    interchainRouter: ROUTER,
    initialBalances: options.tokenBalances,
    logger: testLogger,
  });

  if (options.registerToken ?? true) {
    chain.execute(OWNER, (ctx) =>
      router.setTokenForDomain(ctx, domain, TOKEN),
    );
  }

  return { chain, currency, mailbox, token, router };
}
