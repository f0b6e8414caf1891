import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createSettingsRouter } from './routes/settings.js';
import { createScenarioRouter } from './routes/scenarios.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { getSettingsLoader, type SettingsLoader } from '../services/settings-loader/index.js';

export interface AppDependencies {
  loader?: SettingsLoader;
}

export function createApp(deps: AppDependencies = {}): express.Express {
  const app = express();
  const loader = deps.loader ?? getSettingsLoader();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createSettingsRouter(loader));
  app.use(createScenarioRouter(loader));

  app.use(errorHandler);

  return app;
}
