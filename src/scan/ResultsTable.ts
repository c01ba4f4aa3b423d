/**
 * Display projection of a scan: one row per clip, four text columns.
 */

import { UNVALIDATED_MARKER } from '../config';
import type { Shot } from '../versioning/ShotResolver';

export interface ResultsRow {
  shot: string;
  current: string;
  highest: string;
  highestValid: string;
  failed: boolean;
}

/**
 * Last path segment. Version tokens pass through unchanged; for
 * non-versionable shots this shows the file name instead of the full path.
 */
export function displayName(value: string): string {
  const parts = value.replace(/\\/g, '/').split('/').filter(Boolean);
  return parts[parts.length - 1] ?? value;
}

export function shotRow(shot: Shot): ResultsRow {
  const highestValid = displayName(shot.highestVersion);
  return {
    shot: shot.name,
    current: displayName(shot.currentVersion),
    highest: displayName(shot.highestInvalidVersion),
    highestValid: shot.status === 'unvalidated' ? highestValid + UNVALIDATED_MARKER : highestValid,
    failed: false,
  };
}

/** Row for a clip that could not be resolved; the error code goes in the Current column */
export function failureRow(clipName: string, code: string | undefined): ResultsRow {
  return {
    shot: clipName,
    current: code ?? 'ERROR',
    highest: '',
    highestValid: '',
    failed: true,
  };
}

export function markUpdated(row: ResultsRow, shot: Shot): ResultsRow {
  return { ...row, current: displayName(shot.highestVersion) };
}

export function markFailed(row: ResultsRow, prefix: string): ResultsRow {
  return { ...row, shot: prefix + row.shot, failed: true };
}

export function rowCells(row: ResultsRow): string[] {
  return [row.shot, row.current, row.highest, row.highestValid];
}
