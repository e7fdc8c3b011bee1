import path from 'path';

const PROJECT_ROOT = process.cwd();

export const PLUGINS_DIR = path.resolve(process.env.PLUGINS_DIR || path.join(PROJECT_ROOT, 'plugins'));
export const PLUGIN_PATTERN = process.env.PLUGIN_PATTERN || '*-plugin.{js,mjs}';
export const HOST_CONFIG_FILE = path.resolve(
  process.env.HOST_CONFIG_FILE || path.join(PROJECT_ROOT, 'config', 'host.json'),
);

export const EVENT_HISTORY_SIZE = parseInt(process.env.EVENT_HISTORY_SIZE || '100', 10);
export const PLUGIN_INIT_TIMEOUT = parseInt(process.env.PLUGIN_INIT_TIMEOUT || '30000', 10); // 30s

// 0 keeps the dashboard off
export const DASHBOARD_PORT = parseInt(process.env.DASHBOARD_PORT || '0', 10);
