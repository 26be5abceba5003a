// src/utils/regex.ts

/**
 * Make user input match literally inside a RegExp / $regex.
 */
export const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
