#!/usr/bin/env node
import { CompositionRoot } from './infrastructure/di/CompositionRoot';
import { CLIInputParser } from './infrastructure/cli/CLIInputParser';
import { initGracefulShutdown } from './infrastructure/shutdown/GracefulShutdown';
import { getLogger } from './infrastructure/logging/Logger';
import { describeError } from './domain/errors/OrchestratorErrors';

/**
 * Main entry point: run one batch file through the orchestrator.
 */
async function main(): Promise<void> {
  const options = CLIInputParser.parse(process.argv.slice(2));
  const logger = getLogger('Main');

  if (options.help || !options.jobs) {
    // eslint-disable-next-line no-console
    console.log(CLIInputParser.getHelpText());
    process.exit(options.help ? 0 : 1);
  }

  const shutdown = initGracefulShutdown();

  try {
    const { orchestrator, batchRunner, batchRepository } = CompositionRoot.initialize();
    shutdown.registerHandler('orchestrator', reason => orchestrator.drainAndStop(reason));

    const batch = await batchRepository.loadBatch(options.jobs);
    orchestrator.start();
    const report = await batchRunner.run(batch);

    if (options.out) {
      const written = await batchRepository.saveReport(report, options.out);
      logger.info(`Report written: ${written}`);
    } else {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(report, null, 2));
    }

    await shutdown.shutdown('completed');
  } catch (error) {
    logger.error('Batch run failed', { error: describeError(error) });
    await shutdown.shutdown('error');
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
