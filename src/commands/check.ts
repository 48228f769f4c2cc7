import pc from 'picocolors';
import { buildSite, hasErrors } from '../lib/build.js';
import { createLogger } from '../lib/logger.js';
import { printReport, reportFailure } from './utils.js';

export async function checkCommand(source: string, opts: { config?: string }) {
  const logger = createLogger();
  try {
    const report = await buildSite({ source, configFile: opts.config, write: false, logger });
    printReport(report, logger);
    if (hasErrors(report)) {
      process.exitCode = 1;
      return;
    }
    logger.success(report.diagnostics.length === 0 ? 'No problems found' : pc.yellow('Only warnings found'));
  } catch (error) {
    reportFailure(error, logger);
  }
}
