/**
 * Public entry point.
 *
 * A host integration implements the collaborator interfaces in `host/types`,
 * creates a ScanController with a FastGlobFileSystem, and binds its status
 * surface:
 *
 *   const controller = new ScanController({ timeline, library, fileSystem: new FastGlobFileSystem() });
 *   bindStatusSurface(controller, surface);
 *   controller.scan(controller.getTrackOptions()[0]);
 *   controller.update(IMPORT_LOCATIONS.SOURCE_BIN);
 */

export * from './config';
export * from './core/errors';
export type { Disposable, ManagerBase } from './core/ManagerBase';
export type {
  GlobFileSystem,
  MediaFolder,
  MediaLibrary,
  MediaObject,
  StatusSurface,
  Timeline,
  TimelineClip,
} from './host/types';
export { FastGlobFileSystem } from './host/FastGlobFileSystem';
export { findFolderContaining, findImportedItem, findItemByPath, mediaPath } from './host/MediaLibrarySearch';
export { GlobPattern } from './versioning/GlobPattern';
export {
  extractVersionToken,
  findVersionTokens,
  replaceVersion,
  splitPathSegments,
} from './versioning/PathVersionToken';
export { extractFrameRangeToken, findFrameRangeTokens, isSequencePath } from './versioning/FrameRangeToken';
export { buildDiscoveryPattern, collectVersions, discoverVersions } from './versioning/CandidateDiscovery';
export type { DiscoveryPattern, DiscoveryResult } from './versioning/CandidateDiscovery';
export {
  checkVersionFrames,
  findMissingFrames,
  hasMissingFrames,
  parseFrameNumbers,
  validateVersions,
} from './versioning/SequenceValidator';
export type { FrameCheck, ValidationInput, ValidationResult } from './versioning/SequenceValidator';
export { needsUpdate, resolveShot } from './versioning/ShotResolver';
export type { ResolveContext, Shot, ShotStatus } from './versioning/ShotResolver';
export { applyUpdate, buildUpdatePath, expectedMediaPattern, swapTake } from './versioning/UpdateApplier';
export type { UpdateContext, UpdateOptions, UpdateResult } from './versioning/UpdateApplier';
export { ScanController } from './scan/ScanController';
export type {
  ScanContext,
  ScanControllerEvents,
  ScanFailure,
  ScanReport,
  ScanWarning,
  ShotUpdateOutcome,
  UpdateReport,
} from './scan/ScanController';
export { displayName, rowCells, type ResultsRow } from './scan/ResultsTable';
export { bindStatusSurface } from './scan/StatusSurfaceBinding';
export { EventEmitter, type EventMap } from './utils/EventEmitter';
export { Logger, LogLevel, type LogSink } from './utils/Logger';
