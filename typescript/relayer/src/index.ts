export {
  type PendingTransfer,
  type RelayOutcome,
  type RelayReport,
  TransferRelayer,
  type TransferRelayerOptions,
} from './core/TransferRelayer.js';
export type { RelayerEvent, RelayerObserver } from './core/events.js';
export {
  type TransferWhitelist,
  buildWhitelist,
  transferMatchesWhitelist,
} from './core/whitelist.js';

export { RelayerConfig, RelayerConfigSchema } from './config/RelayerConfig.js';
export type { RelayerConfigInput } from './config/RelayerConfig.js';
