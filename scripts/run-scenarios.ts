import { logger } from '../src/infrastructure/logger.js';
import {
  meetsExpectation,
  renderScenarioReport,
  runScenarios,
} from '../src/services/scenario-runner/index.js';
import { SettingsLoader } from '../src/services/settings-loader/index.js';

const log = logger.child({ module: 'run-scenarios' });

function main(): void {
  const args = process.argv.slice(2);
  const json = args.includes('--json');
  const ids = args.filter((arg) => !arg.startsWith('--'));

  const result = runScenarios(ids.length > 0 ? ids : undefined, { loader: new SettingsLoader() });
  if (!result.ok) {
    console.error(`${result.error.message}\n${result.error.details ?? ''}`);
    process.exit(1);
  }

  const reports = result.value;
  if (json) {
    console.log(JSON.stringify(reports, null, 2));
  } else {
    console.log(reports.map(renderScenarioReport).join('\n\n'));
  }

  const unexpected = reports.filter((report) => !meetsExpectation(report));
  if (unexpected.length > 0) {
    log.error({ scenarios: unexpected.map((r) => r.id) }, 'Scenarios did not match their expected outcome');
    process.exit(1);
  }
}

try {
  main();
} catch (error) {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
}
