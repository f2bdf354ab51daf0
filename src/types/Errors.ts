// src/types/Errors.ts - Error taxonomy surfaced by the core

export abstract class PyroostError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Any network or transport failure, including non-2xx responses.
 */
export class RequestError extends PyroostError {
  readonly code = 'REQUEST_FAILED';

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Any local I/O failure.
 */
export class FilesystemError extends PyroostError {
  readonly code = 'FILESYSTEM_FAILED';

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class VersionNotFoundError extends PyroostError {
  readonly code = 'VERSION_NOT_FOUND';

  constructor(readonly requested: string) {
    super(`Could not find ${requested} to download.`);
  }
}

export class InvalidVersionError extends PyroostError {
  readonly code = 'INVALID_VERSION';

  constructor(readonly input: string) {
    super(`${input} is not a valid Python version`);
  }
}

/**
 * A single upstream catalog entry (asset name or download URL) that does not
 * follow the provider's naming grammar.
 */
/**
 * Project names become a single directory under `virtualenvs/`.
 */
export class InvalidProjectError extends PyroostError {
  readonly code = 'INVALID_PROJECT';

  constructor(readonly project: string) {
    super(`Invalid project name '${project}': use a single directory name`);
  }
}

export class ProviderParseError extends PyroostError {
  readonly code = 'PROVIDER_PARSE_FAILED';

  constructor(
    readonly entry: string,
    readonly reason: string
  ) {
    super(`Could not parse release entry ${entry}: ${reason}`);
  }
}

export class ChecksumMismatchError extends PyroostError {
  readonly code = 'CHECKSUM_MISMATCH';

  constructor(
    readonly file: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Checksum mismatch for ${file}: expected ${expected}, got ${actual}`);
  }
}

export class EnvironmentCreationError extends PyroostError {
  readonly code = 'VENV_CREATION_FAILED';

  constructor(
    readonly venvDir: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(
      `Failed to create virtualenv at ${venvDir} (exit code ${exitCode})${stderr ? `: ${stderr}` : ''}`
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
