#!/usr/bin/env node
import { ZodError } from 'zod';
import { parseCliArgs, usage, type CliOptions } from './cli.js';
import { parseConfig, type Config } from './config.js';
import { createHarvestContext } from './harvest/context.js';
import { runHarvest } from './harvest/coordinator.js';
import { formatSummary } from './harvest/summary.js';
import { logger } from './utils/logger.js';

function loadConfig(overrides: Record<string, string | undefined>): Config | null {
  try {
    return parseConfig({ ...process.env, ...overrides });
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) {
      logger.error({ setting: issue.path.join('.') }, issue.message);
    }
    return null;
  }
}

async function main(): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(usage());
    return 1;
  }

  if (cli.helpRequested) {
    console.log(usage());
    return 0;
  }

  const cfg = loadConfig(cli.env);
  if (!cfg) return 1;

  const ctx = createHarvestContext(cfg);

  // Rows already appended stay valid; rerunning resumes from them.
  const shutdown = (signal: string) => {
    logger.warn(`Received ${signal}, aborting harvest`);
    void ctx.http.close().finally(() => process.exit(130));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  try {
    const summaries = await runHarvest(ctx, cli.targets);
    console.log(formatSummary(summaries));
    console.log(`Files saved to ${ctx.outputDir}/`);
    return 0;
  } finally {
    await ctx.http.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    logger.fatal(err, 'Harvest failed');
    process.exit(1);
  });
