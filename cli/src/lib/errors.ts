export type KitErrorCode =
  | "manifest_invalid"
  | "component_unsupported"
  | "file_conflict"
  | "credential_missing"
  | "checksum_mismatch"
  | "registry_corrupt"
  | "path_escape"
  | "resource_too_large"
  | "not_found"
  | "invalid_input"
  | "git";

export const EXIT_CODES = {
  success: 0,
  partial: 1,
  failure: 2,
  invalidInput: 3,
  notFound: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class KitError extends Error {
  readonly code: KitErrorCode;

  constructor(code: KitErrorCode, message: string) {
    super(message);
    this.name = "KitError";
    this.code = code;
  }
}

export type ManifestIssueCode =
  | "missing_field"
  | "invalid_field"
  | "duplicate_name"
  | "file_not_found"
  | "invalid_file"
  | "checksum_mismatch"
  | "resource_too_large";

export interface ManifestIssue {
  code: ManifestIssueCode;
  message: string;
  field?: string;
}

export class ManifestInvalidError extends KitError {
  readonly issues: ManifestIssue[];

  constructor(issues: ManifestIssue[], code: KitErrorCode = "manifest_invalid") {
    const summary = issues.map((i) => i.message).join("; ");
    super(code, `Manifest validation failed: ${summary}`);
    this.name = "ManifestInvalidError";
    this.issues = issues;
  }
}

export class PathEscapeError extends KitError {
  readonly targetPath: string;

  constructor(targetPath: string, root: string, scope = "the project root") {
    super("path_escape", `Refusing to write outside ${scope}: ${targetPath} (root: ${root})`);
    this.name = "PathEscapeError";
    this.targetPath = targetPath;
  }
}

/** A resource over the size limit; carries every other manifest issue as well. */
export class ResourceTooLargeError extends ManifestInvalidError {
  readonly file: string;
  readonly sizeBytes: number;
  readonly limitBytes: number;

  constructor(issues: ManifestIssue[], file: string, sizeBytes: number, limitBytes: number) {
    super(issues, "resource_too_large");
    this.name = "ResourceTooLargeError";
    this.file = file;
    this.sizeBytes = sizeBytes;
    this.limitBytes = limitBytes;
  }
}

export class NotFoundError extends KitError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class InvalidInputError extends KitError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

export class GitError extends KitError {
  constructor(message: string) {
    super("git", message);
    this.name = "GitError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/**
 * Maps a thrown error to the CLI exit code contract.
 * Manifest and argument problems are invalid input; missing packages or
 * sources are not-found; anything else is a total failure.
 */
export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof KitError) {
    switch (err.code) {
      case "manifest_invalid":
      case "invalid_input":
      case "resource_too_large":
        return EXIT_CODES.invalidInput;
      case "not_found":
        return EXIT_CODES.notFound;
      default:
        return EXIT_CODES.failure;
    }
  }
  return EXIT_CODES.failure;
}
