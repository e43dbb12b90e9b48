#!/usr/bin/env node
import 'dotenv/config';

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { CliUsageError, USAGE, parseCliArguments } from './cli.js';
import { Logger } from './logger.js';
import { runScheduleGeneration } from './schedule/schedule.generation.js';

const logger = new Logger('main');

/**
 * CLI entry point. Every reported failure (missing or invalid config, bad
 * date expression, nothing to schedule) is logged as a single line and
 * maps to exit code 1.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const command = parseCliArguments(argv);
    if (command.kind === 'help') {
      logger.info(USAGE);
      return 0;
    }

    const summary = await runScheduleGeneration(command.options);
    logger.info('Oncall schedule generation completed successfully', summary);
    return 0;
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(`Error: ${error.message}\n${USAGE}`);
      return 1;
    }

    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`, {
      errorName: error instanceof Error ? error.name : undefined,
    });
    return 1;
  } finally {
    await logger.flush();
  }
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// For direct execution (including through the npm bin symlink)
if (isDirectExecution()) {
  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      logger.error('Unexpected failure', error);
      process.exitCode = 1;
    },
  );
}
