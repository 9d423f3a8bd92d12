import http from 'node:http';
import { getRequestListener } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from './logger.js';
import { readPublishedSnapshot } from './runtime/publisher.js';

/** Read-only HTTP view of the last published snapshot */
export function createSnapshotApp(outputFile: string): Hono {
  const app = new Hono();

  app.use('/api/*', cors());

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    }),
  );

  // Collector endpoint; answers {} until the first snapshot lands
  const getAllData = (c: Context) => c.json(readPublishedSnapshot(outputFile) ?? {});
  app.get('/api/getAllData', getAllData);
  app.post('/api/getAllData', getAllData);

  return app;
}

export function startSnapshotServer(port: number, outputFile: string): http.Server {
  const app = createSnapshotApp(outputFile);
  const server = http.createServer(getRequestListener(app.fetch));
  server.on('error', (err) => {
    logger.error({ port, err: err.message }, 'Snapshot server error');
  });
  server.listen(port, () => {
    logger.info({ port }, 'Snapshot server listening');
  });
  return server;
}
