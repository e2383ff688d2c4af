/**
 * Configuration Index - Re-exports configuration loading and types
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   import type { ReconcilerConfig } from './config';
 */

export { loadConfig } from "./env";

export { DEFAULT_RECONCILER_CONFIG } from "./schema";

export type {
  ReconcilerConfig,
  ExchangeConfig,
  PollingConfig,
  StreamConfig,
  OrderConfig,
} from "./schema";
