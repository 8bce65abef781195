export type ErrorCode =
  | "not_found"
  | "already_exists"
  | "cannot_delete"
  | "not_built_in"
  | "no_customization"
  | "invalid_scope"
  | "invalid_category"
  | "mutually_exclusive_flags"
  | "invalid_profile"
  | "invalid_config"
  | "apply_failed";

/**
 * Base class for every failure the CLI reports to the user. Messages are
 * written to be printed as-is and name the command that fixes the problem
 * where one exists.
 */
export class LoadoutError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends LoadoutError {
  constructor(kind: string, name: string, hint?: string) {
    super("not_found", `${kind} "${name}" not found${hint ? `. ${hint}` : ""}`);
  }
}

export class AlreadyExistsError extends LoadoutError {
  constructor(kind: string, name: string, hint?: string) {
    super("already_exists", `${kind} "${name}" already exists${hint ? `. ${hint}` : ""}`);
  }
}

export class CannotDeleteError extends LoadoutError {
  constructor(message: string) {
    super("cannot_delete", message);
  }
}

export class NotBuiltInError extends LoadoutError {
  constructor(name: string) {
    super(
      "not_built_in",
      `profile "${name}" is not a built-in profile. Use 'loadout profile delete ${name}' instead`,
    );
  }
}

export class NoCustomizationError extends LoadoutError {
  constructor(name: string) {
    super("no_customization", `profile "${name}" has no customizations to restore from`);
  }
}

export class InvalidScopeError extends LoadoutError {
  constructor(value: string) {
    super("invalid_scope", `invalid scope "${value}": must be one of user, project, local`);
  }
}

export class InvalidCategoryError extends LoadoutError {
  constructor(value: string, valid: readonly string[]) {
    super("invalid_category", `invalid category "${value}": must be one of ${valid.join(", ")}`);
  }
}

export class MutuallyExclusiveFlagsError extends LoadoutError {
  constructor(a: string, b: string) {
    super("mutually_exclusive_flags", `${a} and ${b} are mutually exclusive`);
  }
}

export class InvalidProfileError extends LoadoutError {
  constructor(source: string, reason: string) {
    super("invalid_profile", `invalid profile ${source}: ${reason}`);
  }
}

export class InvalidConfigError extends LoadoutError {
  constructor(file: string, reason: string) {
    super("invalid_config", `invalid config file ${file}: ${reason}`);
  }
}

export class ApplyFailedError extends LoadoutError {
  constructor(profile: string, failures: number) {
    super("apply_failed", `profile "${profile}" applied with ${failures} failed action${failures === 1 ? "" : "s"}`);
  }
}

export function isLoadoutError(err: unknown): err is LoadoutError {
  return err instanceof LoadoutError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
