/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Base class for per-shot failures raised while resolving or applying a version.
 * Carries the shot's source path so a batch report can point at the offending clip.
 */
export class VersionResolutionError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly shotPath: string
  ) {
    super(message, code);
    this.name = 'VersionResolutionError';
  }
}

/**
 * The version-wildcarded glob matched nothing on disk. Normally impossible while the
 * current render still exists, so it usually means the render was moved or deleted.
 */
export class NoCandidatesFoundError extends VersionResolutionError {
  constructor(
    shotPath: string,
    public readonly pattern: string
  ) {
    super(`No version candidates found for ${shotPath} (glob: ${pattern})`, 'NO_CANDIDATES', shotPath);
    this.name = 'NoCandidatesFoundError';
  }
}

/**
 * No candidate of a sequence shot, the current one included, is complete and long enough.
 */
export class ValidationExhaustedError extends VersionResolutionError {
  constructor(shotPath: string) {
    super(`No valid render available for ${shotPath}`, 'VALIDATION_EXHAUSTED', shotPath);
    this.name = 'ValidationExhaustedError';
  }
}

/**
 * The importer accepted the path but no media item with that path exists in the library.
 */
export class ImportNotFoundError extends VersionResolutionError {
  constructor(
    shotPath: string,
    public readonly importedPath: string
  ) {
    super(`Could not find ${importedPath} in project`, 'IMPORT_NOT_FOUND', shotPath);
    this.name = 'ImportNotFoundError';
  }
}

/**
 * The take swap returned but the clip is still bound to something other than the new path.
 */
export class SwapVerificationFailedError extends VersionResolutionError {
  constructor(
    shotPath: string,
    public readonly expectedPath: string,
    public readonly actualPath: string | null
  ) {
    super(
      `Clip still points at ${actualPath ?? '<no media>'} after swapping to ${expectedPath}`,
      'SWAP_VERIFICATION_FAILED',
      shotPath
    );
    this.name = 'SwapVerificationFailedError';
  }
}

/**
 * The timeline clip has no bound media object (generators, titles, offline clips).
 */
export class MissingMediaError extends VersionResolutionError {
  constructor(clipName: string) {
    super(`Clip "${clipName}" has no media source`, 'MISSING_MEDIA', '');
    this.name = 'MissingMediaError';
  }
}
