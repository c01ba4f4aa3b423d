/**
 * Status-surface text: results table layout and warning copy.
 */

/** Results table header, left to right */
export const RESULT_COLUMNS = ['Shot', 'Current', 'Highest', 'Highest Valid Render'] as const;

/** Suggested column widths in pixels, matching RESULT_COLUMNS */
export const RESULT_COLUMN_WIDTHS = [210, 70, 70, 100] as const;

export const WARNING_TITLE = 'Warning!';

/** Shown when a shot's newest render was rejected and a lower version substituted */
export const MISMATCH_WARNING =
  'Some shots had latest versions that were either missing frames or not long enough. \n' +
  'Using the highest available version that fits the frame range on these clips for now.';

/** Shown when no render of a shot passed validation */
export const EXHAUSTED_WARNING =
  'Some shots have no render that is complete and long enough. ' +
  'These are marked unvalidated and will not be updated.';

export const SCANNING_STATUS = 'Scanning versions..';
