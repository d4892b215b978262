/**
 * Signature fragment helpers shared by the catalog loader and the tracker importer.
 *
 * A pattern is a `|`-separated list of fragments; each fragment is a path or
 * class-signature piece matched by the analyzer against binary contents.
 */

export const PATTERN_SEPARATOR = '|';

/** Characters kept when judging whether a fragment carries any content */
const FRAGMENT_NOISE = /[^a-zA-Z0-9/_]/g;

export function splitPattern(pattern: string): string[] {
  return pattern.split(PATTERN_SEPARATOR);
}

export function joinFragments(fragments: readonly string[]): string {
  return fragments.join(PATTERN_SEPARATOR);
}

/**
 * Strip every character outside `[a-zA-Z0-9/_]`
 */
export function sanitizeFragment(fragment: string): string {
  return fragment.replace(FRAGMENT_NOISE, '');
}

/**
 * A fragment is noise when nothing but separators and punctuation remain:
 * `/` only joins path segments and never identifies anything on its own.
 */
export function isNoiseFragment(fragment: string): boolean {
  return sanitizeFragment(fragment).replace(/\//g, '').length === 0;
}
