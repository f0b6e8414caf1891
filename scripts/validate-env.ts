import 'dotenv/config';
import { readEnvFile } from '../src/infrastructure/env-file.js';
import { logger } from '../src/infrastructure/logger.js';
import { renderSettingsReport, renderValidationReport, toDisplayRecord } from '../src/services/report/index.js';
import { loadSettingsFromEnv, SettingsLoader } from '../src/services/settings-loader/index.js';

const log = logger.child({ module: 'validate-env' });

interface CliOptions {
  envFile?: string;
  json: boolean;
}

function printUsage(): never {
  console.error('Usage: npm run validate:env -- [--env-file <path>] [--json]');
  console.error('  Without --env-file the current process environment is validated.');
  process.exit(1);
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') {
      options.json = true;
    } else if (arg === '--env-file') {
      const path = argv[i + 1];
      if (!path) printUsage();
      options.envFile = path;
      i++;
    } else {
      console.error(`Unknown argument: ${arg}`);
      printUsage();
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  let env: Readonly<Record<string, string | undefined>> = process.env;

  if (options.envFile) {
    const fileResult = await readEnvFile(options.envFile);
    if (!fileResult.ok) {
      log.error({ errorCode: fileResult.error.code, details: fileResult.error.details }, fileResult.error.message);
      process.exit(1);
    }
    env = fileResult.value;
  }

  const result = loadSettingsFromEnv(env, new SettingsLoader());

  if (options.json) {
    const output = result.ok
      ? { valid: true, settings: toDisplayRecord(result.value) }
      : { valid: false, errors: result.error.errors };
    console.log(JSON.stringify(output, null, 2));
  } else {
    console.log(result.ok ? renderSettingsReport(result.value) : renderValidationReport(result.error));
  }

  process.exit(result.ok ? 0 : 1);
}

main().catch((error: unknown) => {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
});
