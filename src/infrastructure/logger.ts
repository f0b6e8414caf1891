import pino from 'pino';

// LOG_LEVEL doubles as a validated setting (DEBUG, INFO, WARNING, ERROR).
function resolveLevel(raw: string | undefined): string {
  if (!raw) return 'info';
  const level = raw.toLowerCase() === 'warning' ? 'warn' : raw.toLowerCase();
  return level === 'silent' || level in pino.levels.values ? level : 'info';
}

export const logger = pino({
  name: 'settings-validator',
  level: resolveLevel(process.env.LOG_LEVEL),
  redact: {
    paths: ['env.*', 'snapshot.*', 'base.*'],
    censor: '**********',
  },
});

export function createScenarioLogger(scenarioId: string, environment?: string) {
  return logger.child({
    scenarioId,
    ...(environment !== undefined && { environment }),
  });
}
