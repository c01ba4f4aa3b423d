/**
 * Scan and update defaults.
 *
 * Labels here are what the host surface shows, so changing one changes what
 * `ScanController.update()` accepts as an import location.
 */

/** Pseudo track entry that scans every video track */
export const ALL_TRACKS = 'All Tracks';

/** Track kind scanned for clips */
export const VIDEO_TRACK_KIND = 'video';

/** Where newly imported versions land in the media library */
export const IMPORT_LOCATIONS = {
  CURRENT_BIN: 'Currently Open Bin',
  SOURCE_BIN: 'Same Bin As Original Clip',
} as const;

export type ImportLocation = (typeof IMPORT_LOCATIONS)[keyof typeof IMPORT_LOCATIONS];

/** Media property holding the absolute source path */
export const FILE_PATH_PROPERTY = 'File Path';

/** Media property holding the first source frame number */
export const START_PROPERTY = 'Start';

/** Prefix put in front of a row's shot name when its update failed */
export const FAILED_ROW_PREFIX = '!! FAILED !! ';

/** Marker appended to a highest-valid cell that could not be validated */
export const UNVALIDATED_MARKER = ' (unvalidated)';

export interface ScanConfig {
  trackKind: string;
  allTracksLabel: string;
  failedRowPrefix: string;
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  trackKind: VIDEO_TRACK_KIND,
  allTracksLabel: ALL_TRACKS,
  failedRowPrefix: FAILED_ROW_PREFIX,
};
