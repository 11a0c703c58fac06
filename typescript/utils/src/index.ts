export {
  formatAmount,
  isPositiveAmount,
  parseUnsignedAmount,
  tryParseAmount,
} from './amount.js';
export { readIchainEnv, safelyAccessEnvVar } from './env.js';
export type { IchainEnv } from './env.js';
export {
  LogFormat,
  LogLevel,
  configureRootLogger,
  createIchainPinoLogger,
  getLogFormat,
  getLogLevel,
  getRootLogger,
  rootLogger,
  setRootLogger,
  toPinoLevel,
} from './logging.js';
export { failure, success, unwrapResult } from './result.js';
export type { Result } from './result.js';
export type { Address, Amount, Domain, HexString } from './types.js';
export {
  assert,
  isNonNegativeInteger,
  isPositiveInteger,
} from './validation.js';
