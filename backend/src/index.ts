import { configFromEnv } from '../../lib/config';
import { logError, logInfo } from '../../lib/logger';
import { createApp } from './app';

const PORT = Number(process.env.PORT) || 8080;

// ─── START SERVER ────────────────────────────────────────────────────────────

try {
  const config = configFromEnv();
  const app = createApp(config);

  app.listen(PORT, () => {
    logInfo(`Email spam graph engine listening on http://localhost:${PORT}`, {
      centrality: config.centralityVariant,
      thresholds: config.thresholds,
    });
    logInfo('Endpoints: GET /api/health, GET /api/config, POST /api/analyze, POST /api/validate, GET /api/sample-data, POST /api/shortest-path');
  });
} catch (error) {
  logError('Failed to start server', { message: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
}
