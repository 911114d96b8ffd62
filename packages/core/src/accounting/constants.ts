/**
 * Accounting Constants
 */

/** Length of the short sliding window */
export const WINDOW_60S_MS = 60 * 1000

/** Length of the long sliding window; records older than this are prunable */
export const WINDOW_24H_MS = 24 * 60 * 60 * 1000

/** Longest window in use */
export const MAX_WINDOW_MS = WINDOW_24H_MS

/** Characters kept visible at each end of a masked api key */
export const MASK_VISIBLE_CHARS = 4

/** Replacement for the hidden middle of an api key */
export const MASK_FILLER = '****'
