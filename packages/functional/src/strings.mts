/**
 * @module strings
 * @description Substring tests. `chars` is matched literally.
 *
 * @category Strings
 * @since 2025-07-03
 */

/**
 * @example
 * startsWith('testing testing', 'te');  // => true
 * startsWith('testing testing', 'cat'); // => false
 */
export const startsWith = (string: string, chars: string): boolean =>
  string.startsWith(chars);

export const endsWith = (string: string, chars: string): boolean =>
  string.endsWith(chars);

export const contains = (string: string, chars: string): boolean =>
  string.includes(chars);
