/**
 * Error types raised by conversion operations.
 */

export class ConversionError extends Error {
  readonly operation: string;

  constructor(message: string, operation: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.operation = operation;
  }
}

/**
 * The output sink rejected a write. Once raised, the encoder that raised it
 * keeps returning this same instance.
 */
export class EncodeError extends ConversionError {
  constructor(cause: unknown) {
    super(`Write to output failed: ${describe(cause)}`, 'encode', { cause });
    this.name = 'EncodeError';
  }
}

export class XmlSyntaxError extends ConversionError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(message, 'decode');
    this.name = 'XmlSyntaxError';
    this.line = line;
    this.column = column;
  }
}

export class SettingsError extends ConversionError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid settings in ${source}: ${issues.join('; ')}`, 'settings');
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
