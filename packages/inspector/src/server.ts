import express from 'express';
import type { Server } from 'http';
import { createInspectorRouter } from './router.js';
import type { CacheInspector } from './inspector.js';

export interface InspectorServerOptions {
  port?: number;
  apiPath?: string;
}

/**
 * Start an Express server that exposes the inspector API
 */
export function startInspectorServer(
  inspector: CacheInspector,
  options: InspectorServerOptions = {}
): Server {
  const app = express();
  app.use(express.json());

  const apiPath = options.apiPath ?? '/api';
  app.use(apiPath, createInspectorRouter(inspector));

  const port = options.port ?? 4100;
  const server = app.listen(port, () => {
    console.log(`[slot-cache] inspector listening on http://localhost:${port}${apiPath}`);
  });

  return server;
}
