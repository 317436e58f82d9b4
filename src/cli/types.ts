import { z, ZodType } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result for successful operations
 *
 * Machine-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - data: command-specific result fields
 *
 * `textOutput` is printed instead of the JSON envelope when present.
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  textOutput?: string;
  [key: string]: unknown;
}

/**
 * Standard CLI error
 *
 * - ok: always false
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  textOutput?: string;
  [key: string]: unknown;
}

/**
 * CLI handler function signature
 * @template TInput - Validated input type (from Zod schema)
 */
export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

export interface RegisteredHandler {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

/**
 * Pair a schema with its handler; the raw Commander input is validated
 * before the handler sees it.
 */
export function registration<TInput>(
  schema: ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>,
): RegisteredHandler {
  return { run: async (rawInput) => handler(schema.parse(rawInput)) };
}

/**
 * Execute a CLI handler with validation and error handling
 *
 * Exit codes: 0 success, 1 invalid arguments or internal error, 2 handled
 * failure (parse error, config error, failed quality gate).
 *
 * @param commandKey - Unique command identifier (e.g., 'smells', 'diff')
 * @param rawInput - Raw input from Commander.js (arguments + options)
 *
 * @example
 * ```typescript
 * .action(async (paths, options) => {
 *   await executeHandler('smells', { paths, ...options });
 * })
 * ```
 */
export async function executeHandler(
  commandKey: string,
  rawInput: unknown
): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const entry = cliHandlers[commandKey];
  if (!entry) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'unknown_command',
        command: commandKey,
        timestamp,
        hint: 'Run "pydelta --help" to see available commands'
      },
      null,
      2
    ));
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const { textOutput, ...result } = await entry.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    log.info(commandKey, { ok: result.ok, duration_ms });

    const envelope = {
      ...result,
      command: commandKey,
      timestamp,
      duration_ms,
    };
    if (result.ok) {
      console.log(textOutput ?? JSON.stringify(envelope, null, 2));
      process.exit(0);
    } else {
      process.stderr.write((textOutput ?? JSON.stringify(envelope, null, 2)) + '\n');
      process.exit(2);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      console.error(JSON.stringify(
        {
          ok: false,
          reason: 'validation_error',
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: 'Check command syntax with --help'
        },
        null,
        2
      ));
      process.exit(1);
      return;
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };

    log.error(commandKey, { ok: false, err: errorDetails, duration_ms });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'internal_error',
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Check logs for details.'
      },
      null,
      2
    ));
    process.exit(1);
  }
}

/**
 * Create a success result
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent handling
 */
export const ErrorReasons = {
  PARSE_ERROR: 'parse_error',
  READ_FAILED: 'read_failed',
  CONFIG_ERROR: 'config_error',
  GIT_FAILED: 'git_failed',
  QUALITY_GATE_FAILED: 'quality_gate_failed',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
} as const;
