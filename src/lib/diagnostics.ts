import type { VFile } from 'vfile';
import { FolioError, MalformedFrontMatterError } from './errors.js';
import type { Diagnostic } from '../types/post.js';

type VFileMessage = VFile['messages'][number];

export function errorDiagnostic(file: string, error: FolioError): Diagnostic {
  const diagnostic: Diagnostic = { file, severity: 'error', message: error.message };
  if (error instanceof MalformedFrontMatterError && error.line !== undefined) diagnostic.line = error.line;
  return diagnostic;
}

export function warningDiagnostic(file: string, message: string): Diagnostic {
  return { file, severity: 'warning', message };
}

// Renderer warnings carry body positions; `lineOffset` maps them back to the file.
export function messageDiagnostic(file: string, message: VFileMessage, lineOffset = 0): Diagnostic {
  const diagnostic: Diagnostic = {
    file,
    severity: message.fatal === true ? 'error' : 'warning',
    message: message.reason,
  };
  if (message.line !== undefined) diagnostic.line = message.line + lineOffset;
  if (message.column !== undefined) diagnostic.column = message.column;
  return diagnostic;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const position = diagnostic.line === undefined
    ? ''
    : `:${diagnostic.line}${diagnostic.column === undefined ? '' : `:${diagnostic.column}`}`;
  return `${diagnostic.file}${position}  ${diagnostic.severity}  ${diagnostic.message}`;
}
