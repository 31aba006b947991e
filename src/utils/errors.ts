/**
 * Error taxonomy.
 *
 * Every error carries a stable `code` so the CLI and tests can branch on the
 * kind without `instanceof` chains across module boundaries.
 */

export type ErrorCode =
  | "NO_WORKSPACE"
  | "INVALID_DIRECTORY"
  | "DIRECTORY_ACCESS"
  | "CONFIG_READ"
  | "CONFIG_WRITE"
  | "SORTING"
  | "EMPTY_EXTENSION"
  | "INVALID_EXTENSION_FORMAT"
  | "EMPTY_CATEGORY_NAME"
  | "DUPLICATE_EXTENSION"
  | "DUPLICATE_CATEGORY"
  | "UNKNOWN_CATEGORY"
  | "UNKNOWN_EXTENSION"
  | "PROTECTED_CATEGORY";

export class DropSorterError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No workspace was chosen, or the chosen one no longer exists. */
export class NoWorkspace extends DropSorterError {
  constructor(message = "No workspace selected. Run `drop-sorter workspace use <path>` first.") {
    super("NO_WORKSPACE", message);
  }
}

export class InvalidDirectory extends DropSorterError {
  readonly path: string;

  constructor(path: string, reason = "is not a directory") {
    super("INVALID_DIRECTORY", `'${path}' ${reason}.`);
    this.path = path;
  }
}

/** Source or destination root could not be read during a cycle. */
export class DirectoryAccessError extends DropSorterError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("DIRECTORY_ACCESS", `Cannot access '${path}': ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

export class ConfigReadError extends DropSorterError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("CONFIG_READ", `Cannot read config file '${path}': ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

export class ConfigWriteError extends DropSorterError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("CONFIG_WRITE", `Cannot write config file '${path}': ${describeError(cause)}`, {
      cause,
    });
    this.path = path;
  }
}

export class SortingError extends DropSorterError {
  constructor(message: string, cause?: unknown) {
    super("SORTING", message, { cause });
  }
}

export class EmptyExtension extends DropSorterError {
  constructor() {
    super("EMPTY_EXTENSION", "Extension cannot be empty.");
  }
}

export class InvalidExtensionFormat extends DropSorterError {
  readonly value: string;

  constructor(value: string) {
    super("INVALID_EXTENSION_FORMAT", `Extension '${value}' must be alphanumeric.`);
    this.value = value;
  }
}

export class EmptyCategoryName extends DropSorterError {
  constructor() {
    super("EMPTY_CATEGORY_NAME", "Category name cannot be empty.");
  }
}

export class DuplicateExtension extends DropSorterError {
  readonly extension: string;
  readonly category: string;

  constructor(extension: string, category: string) {
    super("DUPLICATE_EXTENSION", `Extension '.${extension}' already exists in '${category}'.`);
    this.extension = extension;
    this.category = category;
  }
}

export class DuplicateCategory extends DropSorterError {
  constructor(name: string) {
    super("DUPLICATE_CATEGORY", `Category '${name}' already exists.`);
  }
}

export class UnknownCategory extends DropSorterError {
  constructor(name: string) {
    super("UNKNOWN_CATEGORY", `Category '${name}' does not exist.`);
  }
}

export class UnknownExtension extends DropSorterError {
  constructor(extension: string, category: string) {
    super("UNKNOWN_EXTENSION", `Extension '.${extension}' is not in '${category}'.`);
  }
}

export class ProtectedCategory extends DropSorterError {
  constructor(name: string) {
    super("PROTECTED_CATEGORY", `The '${name}' category cannot be deleted.`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Narrow an unknown thrown value to a Node errno error. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}
