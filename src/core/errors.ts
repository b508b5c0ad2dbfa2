export class LicenseLintError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "LicenseLintError";
  }
}

export class ConfigError extends LicenseLintError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ManifestError extends LicenseLintError {
  constructor(
    message: string,
    public readonly manifestPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ManifestError";
  }
}

export class ProjectRootError extends LicenseLintError {
  constructor(
    message: string,
    public readonly rootPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ProjectRootError";
  }
}

export class LicenseDirectoryError extends LicenseLintError {
  constructor(
    message: string,
    public readonly directory: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "LicenseDirectoryError";
  }
}

export class DuplicateLicenseError extends LicenseDirectoryError {
  constructor(
    public readonly identifier: string,
    public readonly paths: [string, string],
  ) {
    super(
      `${identifier} is the identifier of both ${paths[0]} and ${paths[1]}`,
      paths[0],
    );
    this.name = "DuplicateLicenseError";
  }
}

export class EvidenceError extends LicenseLintError {
  constructor(message: string) {
    super(message);
    this.name = "EvidenceError";
  }
}

export class GitError extends LicenseLintError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  projectRoot: "PROJECT_ROOT_ERROR",
  licenseDirectory: "LICENSE_DIRECTORY_ERROR",
  usage: "USAGE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends LicenseLintError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
  }
}
