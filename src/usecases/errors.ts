export class PurgeReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends PurgeReportError {}

export class DiscoveryError extends PurgeReportError {}

export class NoLogFilesError extends DiscoveryError {
  readonly logDir: string;

  constructor(logDir: string) {
    super(`No log files found in ${logDir}! Nothing to do!`);
    this.logDir = logDir;
  }
}

export class ParseError extends PurgeReportError {
  readonly sourceFile: string;

  constructor(sourceFile: string, cause: unknown) {
    super(`Unable to read ${sourceFile}: ${describeError(cause)}`, { cause });
    this.sourceFile = sourceFile;
  }
}

type SchemaErrorContext = {
  sourceFile?: string;
  field?: string;
};

export class SchemaError extends PurgeReportError {
  readonly sourceFile?: string;
  readonly field?: string;

  constructor(message: string, context: SchemaErrorContext = {}) {
    super(context.sourceFile ? `${message} (in ${context.sourceFile})` : message);
    this.sourceFile = context.sourceFile;
    this.field = context.field;
  }
}

export class MissingFieldError extends SchemaError {
  constructor(sourceFile: string, field: string) {
    super(`Missing required field "${field}"`, { field, sourceFile });
  }
}

export class PrefixMismatchError extends SchemaError {
  constructor(sourceFile: string, directory: string, mountPrefix: string) {
    super(`Directory "${directory}" does not name a user below mount prefix "${mountPrefix}"`, {
      field: "directory",
      sourceFile,
    });
  }
}

export class DuplicateUserError extends SchemaError {
  constructor(user: string, firstFile: string, secondFile: string) {
    super(`User "${user}" appears in more than one log file (first seen in ${firstFile})`, {
      field: "directory",
      sourceFile: secondFile,
    });
  }
}

export class CoercionError extends SchemaError {
  readonly value: string;

  constructor(sourceFile: string, field: string, value: string, reason: string) {
    super(`Invalid value ${JSON.stringify(value)} for field "${field}": ${reason}`, {
      field,
      sourceFile,
    });
    this.value = value;
  }
}

export class OverflowError extends SchemaError {
  constructor(sourceFile: string, field: string) {
    super(`Computing "${field}" overflows an unsigned 64-bit integer`, { field, sourceFile });
  }
}

export class OutputConflictError extends PurgeReportError {
  readonly existingPaths: string[];

  constructor(existingPaths: string[]) {
    super(
      `One or more of the files to be generated already exists: ${existingPaths.join(", ")}. Exiting early to avoid overwriting existing file(s)!`,
    );
    this.existingPaths = existingPaths;
  }
}

export class WriteError extends PurgeReportError {
  readonly targetPath: string;

  constructor(targetPath: string, cause: unknown) {
    super(`Unable to write ${targetPath}: ${describeError(cause)}`, { cause });
    this.targetPath = targetPath;
  }
}

export class SnapshotFormatError extends PurgeReportError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error as { code?: string }).code === code
  );
}
