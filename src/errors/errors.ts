/**
 * Domain error types
 *
 * Every failure the engine reports is one of these classes. The `code`
 * discriminant decides at which granularity a failure is recovered:
 * config errors abort the run, inventory and resolution errors fail one
 * repository, import errors fail one action.
 */

export type RegsyncErrorCode =
  | "config"
  | "pattern"
  | "inventory"
  | "resolution"
  | "import"
  | "shell";

export abstract class RegsyncError extends Error {
  abstract readonly code: RegsyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends RegsyncError {
  readonly code: RegsyncErrorCode = "config";
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.details = details;
  }
}

/**
 * An ignore rule that does not compile. Fatal like any config error.
 */
export class PatternError extends ConfigError {
  override readonly code: RegsyncErrorCode = "pattern";
  readonly rule: string;

  constructor(rule: string, reason: string) {
    super(`Invalid ignore pattern '${rule}': ${reason}`);
    this.rule = rule;
  }
}

export class InventoryError extends RegsyncError {
  readonly code = "inventory";
  readonly registry: string;
  readonly repository?: string;

  constructor(registry: string, repository: string | undefined, message: string, cause?: unknown) {
    const subject = repository ? `'${repository}' in ${registry}` : registry;
    super(`Failed to list ${subject}: ${message}`, { cause });
    this.registry = registry;
    this.repository = repository;
  }
}

export class ResolutionError extends RegsyncError {
  readonly code = "resolution";
  readonly registry: string;

  constructor(registry: string, message: string, cause?: unknown) {
    super(`Unable to resolve registry ${registry}: ${message}`, { cause });
    this.registry = registry;
  }
}

export type ImportErrorKind = "authorization" | "not-found" | "conflict" | "unknown";

export class ImportError extends RegsyncError {
  readonly code = "import";
  readonly kind: ImportErrorKind;
  readonly reference: string;

  constructor(kind: ImportErrorKind, reference: string, message: string, cause?: unknown) {
    super(`Import of ${reference} failed (${kind}): ${message}`, { cause });
    this.kind = kind;
    this.reference = reference;
  }
}

const SECRET_FLAGS = new Set(["--password", "-p"]);

/**
 * Replace the values of secret flags so commands can be logged.
 */
export function redactCommand(command: readonly string[]): string[] {
  return command.map((arg, index) => (index > 0 && SECRET_FLAGS.has(command[index - 1] ?? "") ? "***" : arg));
}

export class ShellCommandError extends RegsyncError {
  readonly code = "shell";
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string[], exitCode: number | null, stdout: string, stderr: string) {
    super(
      `Command ${redactCommand(command).join(" ")} failed with exit code ${exitCode ?? "unknown"}.\n` +
        `STDOUT:\n${stdout}\nSTDERR:\n${stderr}`
    );
    this.command = redactCommand(command);
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Type guard for engine errors.
 */
export function isRegsyncError(err: unknown): err is RegsyncError {
  return err instanceof RegsyncError;
}

/**
 * One-line message for any thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof ShellCommandError) {
    const stderr = err.stderr.trim().split("\n")[0];
    return stderr ? stderr : `exit code ${err.exitCode ?? "unknown"}`;
  }
  return err instanceof Error ? err.message : String(err);
}
