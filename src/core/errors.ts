/**
 * linekit error types
 *
 * Every operation fails through a single error class carrying a code,
 * a descriptive message and, where it helps, a suggestion.
 */

export type ErrorCode =
  | "NOT_FOUND"
  | "IS_A_DIRECTORY"
  | "INVALID_PATTERN"
  | "INVALID_FIELD_SPEC"
  | "PERMISSION_DENIED"
  | "CONFIG_ERROR";

export interface ErrorDetails {
  command?: string;
  path?: string;
  pattern?: string;
  spec?: string;
}

export class LineKitError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = "LineKitError";
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
    };
  }
}

// Factory functions for common errors

export function notFound(path: string): LineKitError {
  return new LineKitError(
    "NOT_FOUND",
    `${path}: No such file or directory`,
    { path },
  );
}

export function isADirectory(path: string, suggestion?: string): LineKitError {
  return new LineKitError(
    "IS_A_DIRECTORY",
    `${path}: Is a directory`,
    { path },
    suggestion,
  );
}

export function permissionDenied(path: string): LineKitError {
  return new LineKitError(
    "PERMISSION_DENIED",
    `${path}: Permission denied`,
    { path },
  );
}

export function invalidPattern(pattern: string, reason: string): LineKitError {
  return new LineKitError(
    "INVALID_PATTERN",
    `Invalid regular expression '${pattern}': ${reason}`,
    { pattern },
    "Escape special characters or use fixedStrings for literal text",
  );
}

export function invalidFieldSpec(spec: string, reason: string): LineKitError {
  return new LineKitError(
    "INVALID_FIELD_SPEC",
    `Invalid field specification '${spec}': ${reason}`,
    { spec },
    "Use 1-based indices and ranges such as '2', '1,3' or '2-4'",
  );
}

export function configError(message: string, path?: string): LineKitError {
  return new LineKitError(
    "CONFIG_ERROR",
    message,
    path ? { path } : undefined,
    "Check your linekit.config.json file",
  );
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Translate a Node.js file-system error into a LineKitError.
 *
 * Errors that are not errno failures are returned unchanged so the caller
 * can rethrow them as they are.
 */
export function fromFsError(error: unknown, path: string): unknown {
  switch (errnoCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return notFound(path);
    case "EISDIR":
      return isADirectory(path);
    case "EACCES":
    case "EPERM":
      return permissionDenied(path);
    default:
      return error;
  }
}
