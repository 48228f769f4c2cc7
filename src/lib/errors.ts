export type FolioErrorCode =
  | 'MALFORMED_FRONT_MATTER'
  | 'INVALID_POST_IDENTIFIER'
  | 'UNKNOWN_LAYOUT'
  | 'DUPLICATE_IDENTIFIER'
  | 'UNKNOWN_POST'
  | 'CONFIG';

export class FolioError extends Error {
  readonly code: FolioErrorCode;

  constructor(code: FolioErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedFrontMatterError extends FolioError {
  /** 1-based line in the source file, when known. */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super('MALFORMED_FRONT_MATTER', message);
    this.line = line;
  }
}

export class InvalidPostIdentifierError extends FolioError {
  constructor(readonly identifier: string, reason: string) {
    super('INVALID_POST_IDENTIFIER', `Invalid post identifier "${identifier}": ${reason}`);
  }
}

export class UnknownLayoutError extends FolioError {
  constructor(readonly layout: string | undefined, known: string[]) {
    super(
      'UNKNOWN_LAYOUT',
      layout
        ? `Unknown layout "${layout}" (known: ${known.join(', ')})`
        : `No layout given and no default layout configured (known: ${known.join(', ')})`,
    );
  }
}

export class DuplicateIdentifierError extends FolioError {
  constructor(readonly identifiers: string[]) {
    super('DUPLICATE_IDENTIFIER', `Duplicate post identifiers: ${identifiers.join(', ')}`);
  }
}

export class UnknownPostError extends FolioError {
  constructor(readonly identifier: string) {
    super('UNKNOWN_POST', `Post "${identifier}" is not part of this collection`);
  }
}

export class ConfigError extends FolioError {
  constructor(readonly file: string, details: string) {
    super('CONFIG', `Invalid site configuration in ${file}: ${details}`);
  }
}
