/**
 * Error taxonomy for stackguard.
 *
 * Fatal errors (InputError, ConfigError) abort the invocation and map to exit
 * code 2. MatchError is recoverable: the engine records it as a warning and
 * moves on to the next (file, rule) pair.
 */

export type ErrorCode =
  | "ROOT_NOT_FOUND"
  | "ROOT_NOT_DIRECTORY"
  | "CATALOG_UNREADABLE"
  | "UNKNOWN_PROFILE"
  | "INVALID_OPTION"
  | "RULE_INVALID"
  | "CONFIG_INVALID"
  | "MATCH_FAILED"
  | "MATCH_TIMEOUT";

/** Exit code for fatal input and configuration errors. */
export const FATAL_EXIT_CODE = 2;

export class StackguardError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown; exitCode?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StackguardError";
    this.code = code;
    this.exitCode = options?.exitCode ?? FATAL_EXIT_CODE;
  }
}

/** Bad root path, unreadable rule catalog, or an invalid command-line value. */
export class InputError extends StackguardError {
  constructor(message: string, code: ErrorCode = "INVALID_OPTION", options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = "InputError";
  }
}

/** Malformed rule definition or project config file. Raised at load time. */
export class ConfigError extends StackguardError {
  public readonly source?: string;

  constructor(message: string, options?: { source?: string; code?: ErrorCode; cause?: unknown }) {
    super(options?.source ? `${options.source}: ${message}` : message, options?.code ?? "RULE_INVALID", options);
    this.name = "ConfigError";
    this.source = options?.source;
  }
}

/** A rule's matcher threw or ran past its time budget on one file. */
export class MatchError extends StackguardError {
  public readonly ruleId: string;
  public readonly file: string;

  constructor(message: string, ruleId: string, file: string, code: ErrorCode = "MATCH_FAILED") {
    super(message, code, { exitCode: 0 });
    this.name = "MatchError";
    this.ruleId = ruleId;
    this.file = file;
  }
}

/**
 * Check whether an error should abort the whole invocation.
 */
export function isFatalError(err: unknown): err is InputError | ConfigError {
  return err instanceof InputError || err instanceof ConfigError;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
