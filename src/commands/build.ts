import path from 'node:path';
import pc from 'picocolors';
import { buildSite, hasErrors } from '../lib/build.js';
import { createLogger } from '../lib/logger.js';
import { printReport, reportFailure } from './utils.js';

export type BuildCommandOptions = {
  destination?: string;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
};

export async function buildCommand(source: string, opts: BuildCommandOptions) {
  const logger = createLogger({ quiet: opts.quiet, verbose: opts.verbose });
  logger.info(pc.blue(`Building ${pc.bold(path.resolve(source))}...`));
  try {
    const report = await buildSite({ source, destination: opts.destination, configFile: opts.config, logger });
    printReport(report, logger);
    if (hasErrors(report)) {
      process.exitCode = 1;
      return;
    }
    logger.success(`Build complete! Output: ${report.destination}`);
  } catch (error) {
    reportFailure(error, logger);
  }
}
