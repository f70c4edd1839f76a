import { loadSettings, validateSettings } from '../config/settings';
import { buildIngestionDependencies, createRuntime } from '../runtime';
import { runIngestion } from '../workers/ingestionRun';

const USAGE = `Usage: runIngestion [--force]

  --force   ignore the staleness gate and run now
  --help    show this message`;

async function run(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }
  const unknown = args.filter(arg => arg !== '--force');
  if (unknown.length > 0) {
    console.error(`Unknown arguments: ${unknown.join(' ')}\n\n${USAGE}`);
    return 2;
  }

  const settings = loadSettings();
  for (const problem of validateSettings(settings)) {
    console.warn(`Config warning: ${problem}`);
  }

  const outcome = await runIngestion(buildIngestionDependencies(createRuntime(settings)), {
    force: args.includes('--force'),
  });
  console.log('Ingestion finished:', JSON.stringify(outcome, null, 2));
  return outcome.status === 'failed' ? 1 : 0;
}

run().then(
  code => process.exit(code),
  error => {
    console.error('Ingestion failed', error);
    process.exit(1);
  },
);
