/**
 * Tracker signature canonicalization
 *
 * Remote code signatures use dotted class/package paths with `|` as an OR
 * separator (e.g. `com.foo.ads.|com.bar.`). The analyzer matches slash
 * separated path fragments, so signatures are rewritten before comparison.
 */

import { isNoiseFragment, joinFragments, PATTERN_SEPARATOR } from '../catalog/fragments';

/**
 * Rewrite a dotted signature into path fragments, in signature order.
 * Noise fragments are kept; see `usableFragments`.
 */
export function canonicalizeSignature(codeSignature: string): string[] {
  return codeSignature
    .replace(/\.\|/g, PATTERN_SEPARATOR)
    .replace(/^\.+/, '')
    .replace(/\.+$/, '')
    .replace(/\./g, '/')
    .replace(/\\\//g, '/')
    .split(PATTERN_SEPARATOR)
    .map(fragment => fragment.trim());
}

/**
 * Canonical fragments that carry an identifier
 */
export function usableFragments(codeSignature: string): string[] {
  return canonicalizeSignature(codeSignature).filter(fragment => !isNoiseFragment(fragment));
}

/**
 * Section name for a remote tracker: lower-cased, alphanumerics only
 */
export function canonicalSectionName(displayName: string): string {
  return displayName.replace(/[^a-zA-Z0-9]/g, '').toLowerCase();
}

export function canonicalPattern(codeSignature: string): string {
  return joinFragments(usableFragments(codeSignature));
}
