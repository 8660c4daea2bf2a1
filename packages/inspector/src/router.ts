import express from 'express';
import type { CacheInspector } from './inspector.js';

export function createInspectorRouter(inspector: CacheInspector): express.Router {
  const router = express.Router();

  router.get('/graph', (_req, res) => {
    try {
      res.json(inspector.getGraph());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      res.status(500).json({ error: message });
    }
  });

  router.get('/passes', (_req, res) => {
    res.json({ passes: inspector.listPasses() });
  });

  router.get('/dump', (_req, res) => {
    try {
      res.type('text/plain').send(inspector.dump());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      res.status(500).json({ error: message });
    }
  });

  router.post('/groups/:id/invalidate', (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id < 0) {
      res.status(400).json({ error: `Invalid group id: ${req.params.id}` });
      return;
    }
    try {
      inspector.invalidateGroup(id);
      res.json({ queued: true, needsPass: inspector.needsPass() });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      res.status(404).json({ error: message });
    }
  });

  return router;
}
