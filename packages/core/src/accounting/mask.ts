import { MASK_FILLER, MASK_VISIBLE_CHARS } from './constants.js'

/**
 * Mask an api key for display, keeping a short prefix and suffix.
 * Keys too short to keep both ends hidden are fully replaced.
 *
 * @example
 * maskApiKey('ABCDEFGHIJKL') // 'ABCD****IJKL'
 * maskApiKey('short')        // '****'
 */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= MASK_VISIBLE_CHARS * 2) {
    return MASK_FILLER
  }
  return `${apiKey.slice(0, MASK_VISIBLE_CHARS)}${MASK_FILLER}${apiKey.slice(-MASK_VISIBLE_CHARS)}`
}
