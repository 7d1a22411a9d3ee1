export type FontToolErrorCode =
  | 'UNSUPPORTED_LANGUAGE'
  | 'RANGE_PARSE'
  | 'CLI_USAGE'
  | 'CONVERTER_NOT_FOUND'
  | 'CONVERTER_FAILED';

/**
 * Base class for every failure the tool reports to the user.
 * The CLI catches these by `instanceof` and turns them into exit code 1.
 */
export class FontToolError extends Error {
  readonly code: FontToolErrorCode;

  constructor(code: FontToolErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FontToolError';
    this.code = code;
  }
}

/** The language code has no entry in LANGUAGE_RANGES. */
export class UnsupportedLanguageError extends FontToolError {
  readonly language: string;

  constructor(language: string) {
    super('UNSUPPORTED_LANGUAGE', `Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
    this.language = language;
  }
}

/** A range token is not of the form 0xSTART-0xEND. */
export class RangeParseError extends FontToolError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super('RANGE_PARSE', `Invalid range "${token}": ${reason}`);
    this.name = 'RangeParseError';
    this.token = token;
  }
}

export class CliUsageError extends FontToolError {
  constructor(message: string) {
    super('CLI_USAGE', message);
    this.name = 'CliUsageError';
  }
}

export class ConverterNotFoundError extends FontToolError {
  readonly executable: string;

  constructor(executable: string, options?: ErrorOptions) {
    super(
      'CONVERTER_NOT_FOUND',
      `Error: ${executable} not found. Please install it using: npm install -g lv_font_conv`,
      options,
    );
    this.name = 'ConverterNotFoundError';
    this.executable = executable;
  }
}

/** The converter ran but exited non-zero (or was killed by a signal). */
export class ConverterFailedError extends FontToolError {
  readonly executable: string;
  readonly status: number | null;

  constructor(executable: string, status: number | null, detail: string, options?: ErrorOptions) {
    super('CONVERTER_FAILED', `Error running ${executable}: ${detail}`, options);
    this.name = 'ConverterFailedError';
    this.executable = executable;
    this.status = status;
  }
}
