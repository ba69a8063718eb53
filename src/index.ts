import express from 'express';
import { config } from './config';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import routes from './routes';

const app = express();

app.use(express.json());

// Request logging
app.use(requestLogger);

// Mount all routes
app.use('/api', routes);

// Health check endpoint
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Global error handler (must be last)
app.use(errorHandler);

let server: ReturnType<typeof app.listen> | null = null;

function startServer(port?: number): ReturnType<typeof app.listen> {
  const listenPort = port ?? config.server.port;
  server = app.listen(listenPort, () => {
    console.log(`Pool ledger listening on port ${listenPort} in ${config.server.env} mode`);
  });
  return server;
}

// Auto-start only when run directly (not when imported by tests)
if (require.main === module) {
  startServer();
}

export { app, server, startServer };
