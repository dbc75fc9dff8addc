import { serve } from '@hono/node-server';
import { config } from './lib/config.js';
import { initTokenizer } from './metrics/tokenizer.js';
import { isLlmConfigured } from './lib/openrouter.js';
import { createApp } from './app.js';

const start = async () => {
  const tokenizer = await initTokenizer(config.TOKENIZER);
  console.log(`[Server] Tokenizer: ${tokenizer.kind}`);

  if (!isLlmConfigured()) {
    console.warn('[Server] OPEN_ROUTER_API_KEY is not set; feedback and rubric extraction use fallbacks');
  }

  const app = createApp({
    corsOrigin: config.CORS_ORIGIN,
    requestLogging: config.NODE_ENV !== 'test',
  });

  const port = config.API_PORT;
  console.log(`Server starting on port ${port}...`);
  const server = serve({ fetch: app.fetch, port });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[Server] Shutting down...');
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
};

start().catch((err) => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});
