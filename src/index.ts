import { FeishuAdapter } from './adapters/FeishuAdapter.js';
import type { PluginManager } from './adapters/BaseAdapter.js';

export const version = '0.1.0';

/**
 * Plugin entry point, called by the host's plugin manager during discovery
 */
export function register(manager: PluginManager): void {
  manager.registerChannel(new FeishuAdapter());
}

export * from './adapters/index.js';
export { ConnectionSupervisor } from './connection/ConnectionSupervisor.js';
export type { SupervisorOptions } from './connection/ConnectionSupervisor.js';
export type {
  ConnectionContext,
  ConnectionContextFactory,
  ConnectionMessage,
  ConnectionOptions,
  ConnectionState,
} from './connection/types.js';
export { DedupWindow } from './utils/DedupWindow.js';
export { normalizeEvent } from './utils/eventNormalizer.js';
export { ChannelError, ConfigurationError, StartupError } from './utils/errors.js';
