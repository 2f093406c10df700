#!/usr/bin/env tsx
import 'dotenv/config';
import { errorMessage, isFatalError } from '../shared/errors';
import { USAGE, parseCommandLine, runCommand } from './commands';
import { getPublicConfig, loadConfig } from './config/config';
import { createLogger } from './obs/logger';

const main = async (): Promise<number> => {
  let logger = createLogger({ observability: { logLevel: 'info' } });
  const controller = new AbortController();
  try {
    const parsed = parseCommandLine(process.argv.slice(2));
    if (parsed.command === 'help') {
      process.stdout.write(USAGE);
      return 0;
    }
    const config = loadConfig();
    logger = createLogger(config);
    logger.info('Config loaded', { command: parsed.command, ...getPublicConfig(config) });

    process.once('SIGINT', () => {
      logger.warn('Interrupted; stopping after in-flight writes');
      controller.abort();
    });

    const summary = await runCommand(parsed, {
      config,
      logger,
      cwd: process.cwd(),
      signal: controller.signal,
    });
    process.stdout.write(
      `${JSON.stringify({ runId: summary.runId, counts: summary.counts, failures: summary.failures.length })}\n`,
    );
    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      logger.error('Command failed', { error: errorMessage(error), kind: error.name });
      process.stderr.write(USAGE);
      return 1;
    }
    if (controller.signal.aborted) {
      logger.warn('Command stopped', { error: errorMessage(error) });
      return 0;
    }
    logger.error('Unexpected failure', { error: errorMessage(error) });
    return 1;
  }
};

main().then((code) => {
  process.exitCode = code;
});
