// packages/core/src/digest/index.ts
import { DEFAULT_DIGESTS } from '../config/defaults.js';
import { DigesterRegistry } from '../config/DigesterRegistry.js';
import type { Digester } from './Digester.js';
import type { JsonMap } from '../types/index.js';

export type { Digester } from './Digester.js';
export { HashDigester, Md5Digester, Sha1Digester, Sha256Digester, Sha512Digester } from './HashDigester.js';
export { LengthDigester } from './LengthDigester.js';

/** Fresh md5, sha1, sha256 and length digesters, in that order. */
export function defaultDigesters(): Digester[] {
  return DigesterRegistry.create(DEFAULT_DIGESTS);
}

/**
 * Finish every digester and merge the results into `footer`.
 * Existing keys named like a digester are overwritten; others are kept.
 * Returns `footer` untouched when there are no digesters.
 */
export function mergeDigests(
  footer: JsonMap | null,
  digesters: readonly Digester[],
): JsonMap | null {
  if (digesters.length === 0) return footer;
  const merged: JsonMap = { ...(footer ?? {}) };
  for (const d of digesters) merged[d.name] = d.finish();
  return merged;
}
