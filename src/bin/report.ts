#!/usr/bin/env node
import 'dotenv/config';
import process from 'node:process';

import { DEFAULT_OUTPUT_FILE, loadConfig } from '../config/load-config.js';
import { createConsoleLogger, isDebugEnabled } from '../core/logger.js';
import { runReport } from '../core/run-report.js';
import { defaultDelay } from '../core/types.js';

const VALUE_FLAGS = new Set(['--app-id', '--app-label', '--output', '-o']);

const args = process.argv.slice(2);

const showUsage = (code = 0): never => {
  console.log(`Usage: okta-origin-report [options]

Reads OKTA_DOMAIN, OKTA_API_TOKEN, BOB_APP_ID and BOB_APP_LABEL from the environment or .env.

Options:
  --app-id <id>         Okta application id of the Bob integration (skips the label search)
  --app-label <label>   Label to search for when the app id is unknown
  -o, --output <path>   Report path, .xlsx or .csv (default: ${DEFAULT_OUTPUT_FILE})
  -h, --help            Show this help message
`);
  process.exit(code);
};

for (let i = 0; i < args.length; i += 1) {
  const arg = args[i] ?? '';
  if (arg === '-h' || arg === '--help') {
    showUsage(0);
  } else if (VALUE_FLAGS.has(arg)) {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      console.error(`Missing value for ${arg}`);
      showUsage(1);
    }
    i += 1;
  } else if (!Array.from(VALUE_FLAGS).some((flag) => arg.startsWith(`${flag}=`))) {
    console.error(`Unknown argument: ${arg}`);
    showUsage(1);
  }
}

const main = async () => {
  const logger = createConsoleLogger('okta', isDebugEnabled(process.env));
  const config = loadConfig(process.env, args);
  const summary = await runReport(config, {
    fetch,
    now: () => new Date(),
    delay: defaultDelay,
    logger,
  });

  const report = createConsoleLogger('report');
  report.info(`Report generated successfully: ${summary.outputPath}`);
  report.info(`Total users processed: ${summary.rowCount}`);
  report.info(`Imported (bob): ${summary.importedCount}, Manual (OKTA): ${summary.manualCount}`);
  report.info(`bob app id used: ${summary.bobAppId}`);
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  console.error(`[okta-origin-report] ${message}`);
  process.exit(1);
});
