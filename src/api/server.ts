import 'dotenv/config';
import { createApp } from './app.js';
import { logger } from '../infrastructure/logger.js';
import { getScenarioCatalog } from '../services/scenario-runner/index.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

function main(): void {
  const { scenarios } = getScenarioCatalog();
  const app = createApp();

  app.listen(PORT, () => {
    logger.info({ port: PORT, scenarioCount: scenarios.length }, 'Settings validation API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
