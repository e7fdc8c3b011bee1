/**
 * Runtime Dashboard: local JSON API for inspecting and toggling plugins.
 * Binds to localhost only (no auth needed).
 *
 * - Loaded plugins and their state, registered analyzers
 * - Plugin health
 * - Hook points, callback counts and execution stats
 * - Recent events
 */
import express from 'express';
import type { Server } from 'http';

import { logger } from './logger.js';
import type { PluginManager } from './plugins/manager.js';
import type { PluginEvent } from './plugins/types.js';

const DEFAULT_EVENT_LIMIT = 20;

export interface HealthReport {
  status: 'ok' | 'degraded';
  uptime: number;
  plugins: Record<string, boolean>;
}

export async function healthReport(manager: PluginManager): Promise<HealthReport> {
  const plugins = await manager.healthCheck();
  const healthy = Object.values(plugins).every(Boolean);
  return { status: healthy ? 'ok' : 'degraded', uptime: process.uptime(), plugins };
}

export function hookReport(manager: PluginManager): {
  points: Array<{ name: string; hooks: number }>;
  stats: Record<string, number>;
} {
  return {
    points: manager.hooks.listHookPoints().map((name) => ({ name, hooks: manager.hooks.countHooks(name) })),
    stats: manager.hooks.getStats(),
  };
}

export function eventReport(manager: PluginManager, query: { name?: unknown; limit?: unknown }): PluginEvent[] {
  const name = typeof query.name === 'string' && query.name !== '' ? query.name : undefined;
  const limit = typeof query.limit === 'string' ? parseInt(query.limit, 10) : NaN;
  return manager.events.history(name, Number.isNaN(limit) ? DEFAULT_EVENT_LIMIT : limit);
}

/** Returns an HTTP status and body for `POST /api/plugins/:name/:action`. */
export function applyPluginAction(
  manager: PluginManager,
  name: string,
  action: string,
): { status: number; body: Record<string, unknown> } {
  if (action !== 'enable' && action !== 'disable') {
    return { status: 400, body: { error: `Unknown action: ${action}` } };
  }
  if (!manager.getPlugin(name)) {
    return { status: 404, body: { error: 'Plugin not found' } };
  }
  const ok = action === 'enable' ? manager.enablePlugin(name) : manager.disablePlugin(name);
  if (!ok) {
    return { status: 409, body: { error: `Cannot ${action} plugin in state "${manager.getState(name)}"` } };
  }
  return { status: 200, body: { ok: true, state: manager.getState(name) } };
}

export function createDashboard(manager: PluginManager): express.Express {
  const app = express();
  app.use(express.json());

  // --- API Routes ---

  app.get('/api/plugins', (_req, res) => {
    res.json(manager.listPlugins());
  });

  app.get('/api/analyzers', (_req, res) => {
    res.json(manager.listAnalyzers());
  });

  app.get('/api/health', async (_req, res) => {
    try {
      res.json(await healthReport(manager));
    } catch (err) {
      res.status(500).json({ error: String(err) });
    }
  });

  app.get('/api/hooks', (_req, res) => {
    res.json(hookReport(manager));
  });

  app.get('/api/events', (req, res) => {
    res.json(eventReport(manager, req.query));
  });

  // Enable/disable a plugin
  app.post('/api/plugins/:name/:action', (req, res) => {
    const { status, body } = applyPluginAction(manager, req.params.name, req.params.action);
    res.status(status).json(body);
  });

  return app;
}

export function startDashboard(port: number, manager: PluginManager): Server {
  const app = createDashboard(manager);
  return app.listen(port, '127.0.0.1', () => {
    logger.info({ port }, `Dashboard running at http://localhost:${port}`);
  });
}
