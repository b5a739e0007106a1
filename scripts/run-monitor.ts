/**
 * NewsRelay — Monitor Runner
 *
 * Starts the continuous scheduler and the control server, or runs a single
 * cycle with --once (for cron or a serverless trigger).
 *
 * Usage:
 *   npm run monitor              # Continuous mode with control server
 *   npm run monitor -- --once    # One cycle, then exit
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { errorMessage, logger } from '../src/lib/logger';
import { createApplication } from '../src/pipeline';
import { createControlApp, startServer } from '../src/server/control';

interface RunOptions {
  once: boolean;
  noServer: boolean;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  return {
    once: args.includes('--once'),
    noServer: args.includes('--no-server'),
  };
}

async function runOnce(): Promise<void> {
  const config = loadConfig();
  const { monitor } = createApplication(config);
  await monitor.warmUp();

  const report = await monitor.runCycle();

  console.log('\n' + '='.repeat(60));
  console.log('CYCLE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Status: ${report.status}${report.error ? ` (${report.error})` : ''}`);
  console.log(`Portal: ${report.portalFound} found, ${report.portalNew} new`);
  console.log(`Aggregator: ${report.aggregatorFound} found, ${report.aggregatorNew} new, ${report.renamed} renamed`);
  console.log(`Sent: ${report.sent}`);
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log('='.repeat(60) + '\n');

  if (report.status === 'error') {
    process.exit(1);
  }
}

async function runContinuous(options: RunOptions): Promise<void> {
  const config = loadConfig();
  const { monitor, scheduler } = createApplication(config);
  await monitor.warmUp();

  if (!options.noServer) {
    startServer(
      createControlApp({
        monitor,
        scheduler,
        token: config.control.token,
        cacheMaxAgeDays: config.cache.maxAgeDays,
      }),
      config.control.port
    );
  }

  scheduler.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    scheduler.stop();
    try {
      await monitor.saveCacheSnapshot();
    } catch (error) {
      logger.error('Cache snapshot not saved on shutdown', { error: errorMessage(error) });
    }
    process.exit(0);
  };

  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));
}

async function main(): Promise<void> {
  const options = parseArgs();
  try {
    if (options.once) {
      await runOnce();
    } else {
      await runContinuous(options);
    }
  } catch (error) {
    const errorMsg = errorMessage(error);
    logger.error('Monitor failed to start', { error: errorMsg });
    console.error('\nMonitor failed:', errorMsg);
    process.exit(1);
  }
}

main();
