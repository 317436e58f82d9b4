import type { z } from 'zod';

export interface ParseErrorInfo {
  kind: 'parse_error';
  message: string;
  line: number;
  column: number;
}

/**
 * Raised when a syntax tree is the product of invalid source.
 *
 * Entry points that must not throw convert it to a {@link ParseErrorInfo}
 * via {@link ParseError.toInfo}.
 */
export class ParseError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'ParseError';
    this.line = line;
    this.column = column;
  }

  toInfo(): ParseErrorInfo {
    return { kind: 'parse_error', message: this.message, line: this.line, column: this.column };
  }
}

export class ConfigError extends Error {
  readonly issues: Array<{ path: string; message: string; code: string }>;

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));
  }
}
