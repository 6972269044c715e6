/** Name used in log prefixes and sink service identifiers. */
export const LIBRARY_NAME = "wrapgrid";

/** Default marker appended to the last kept line of a height-truncated cell. */
export const DEFAULT_TRUNCATION_MARKER = "...";

/** Default left/right padding of every column. */
export const DEFAULT_PADDING: readonly [number, number] = [1, 1];

/** Upper bound for any single resolved width, mirrors a 16-bit terminal column count. */
export const MAX_WIDTH = 65_535;
