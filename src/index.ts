import { pathToFileURL } from 'url';

import {
  DASHBOARD_PORT,
  EVENT_HISTORY_SIZE,
  HOST_CONFIG_FILE,
  PLUGIN_INIT_TIMEOUT,
  PLUGIN_PATTERN,
  PLUGINS_DIR,
} from './config.js';
import { startDashboard } from './dashboard.js';
import { createConfigAccessor, loadHostConfig } from './host-config.js';
import { logger } from './logger.js';
import { PluginManager } from './plugins/manager.js';

export * from './plugins/index.js';
export { createConfigAccessor, loadHostConfig, type HostConfig } from './host-config.js';
export { createDashboard, startDashboard } from './dashboard.js';

/** Build a manager from the environment and load the plugin directory. */
export async function bootstrap(): Promise<PluginManager> {
  const config = createConfigAccessor(loadHostConfig(HOST_CONFIG_FILE));
  const manager = new PluginManager({
    config,
    historySize: EVENT_HISTORY_SIZE,
    initTimeoutMs: PLUGIN_INIT_TIMEOUT,
  });

  const loaded = await manager.loadFromDirectory(PLUGINS_DIR, PLUGIN_PATTERN);
  logger.info({ dir: PLUGINS_DIR, loaded }, `Loaded ${loaded.length} plugin(s)`);
  return manager;
}

async function main(): Promise<void> {
  const manager = await bootstrap();

  const server = DASHBOARD_PORT > 0 ? startDashboard(DASHBOARD_PORT, manager) : null;

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');
    server?.close();
    await manager.shutdownAll();
    process.exit(0);
  };
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
}

// Guard: only run when executed directly, not when imported as a library
const isDirectRun = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main().catch((err) => {
    logger.error({ err }, 'Failed to start runtime');
    process.exit(1);
  });
}
