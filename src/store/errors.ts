/**
 * Store Module - Error Types
 *
 * Typed error union for file storage.
 * Errors are values, not exceptions.
 */

export type StorageError =
  | {
      readonly type: "NOT_FOUND";
      readonly path: string;
    }
  | {
      readonly type: "READ_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PARSE_FAILED";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a NOT_FOUND error.
 */
export function notFound(path: string): StorageError {
  return { type: "NOT_FOUND", path };
}

/**
 * Create a READ_FAILED error.
 */
export function readFailed(path: string, cause: Error): StorageError {
  return { type: "READ_FAILED", path, message: cause.message, cause };
}

/**
 * Create a PARSE_FAILED error.
 */
export function parseFailed(path: string, message: string): StorageError {
  return { type: "PARSE_FAILED", path, message };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(path: string, cause: Error): StorageError {
  return { type: "WRITE_FAILED", path, message: cause.message, cause };
}

/**
 * Format a StorageError for logging.
 */
export function formatStorageError(error: StorageError): string {
  switch (error.type) {
    case "NOT_FOUND":
      return `File not found: ${error.path}`;
    case "READ_FAILED":
      return `Could not read ${error.path}: ${error.message}`;
    case "PARSE_FAILED":
      return `Could not parse ${error.path}: ${error.message}`;
    case "WRITE_FAILED":
      return `Could not write ${error.path}: ${error.message}`;
  }
}
