/**
 * Path token patterns.
 *
 * A version token is a `v`/`V` followed by digits (`v0007`). A frame-range token is
 * the bracketed span a host writes into a sequence's display path (`[1001-1050]`).
 * Both are global so callers can iterate every occurrence; always reset or copy
 * before reusing `lastIndex`.
 */

/** Matches every version-like substring */
export const VERSION_TOKEN_PATTERN = /[vV][0-9]+/g;

/** Matches every bracketed frame-range substring */
export const FRAME_RANGE_PATTERN = /\[[0-9-]+\]/g;

/** Characters that separate path segments on any platform we read paths from */
export const PATH_SEPARATOR_PATTERN = /[\\/]/;
