import pc from 'picocolors';
import { formatDiagnostic } from '../lib/diagnostics.js';
import { FolioError } from '../lib/errors.js';
import type { BuildReport } from '../lib/build.js';
import type { Logger } from '../lib/logger.js';

export function printReport(report: BuildReport, logger: Logger): void {
  for (const diagnostic of report.diagnostics) {
    const line = formatDiagnostic(diagnostic);
    if (diagnostic.severity === 'error') logger.error(line);
    else logger.warn(line);
  }
  const errors = report.diagnostics.filter(d => d.severity === 'error').length;
  const warnings = report.diagnostics.length - errors;
  const summary = `${report.pages.length} pages, ${report.assets.length} static files, ${errors} errors, ${warnings} warnings`;
  if (errors > 0) logger.error(summary);
  else logger.info(pc.dim(summary));
}

/** Prints a run-ending failure; anything that is not a FolioError keeps its stack. */
export function reportFailure(error: unknown, logger: Logger): void {
  if (error instanceof FolioError) {
    logger.error(`Error: ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.stack ?? error.message);
  } else {
    logger.error(String(error));
  }
  process.exitCode = 1;
}
