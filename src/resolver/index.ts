/**
 * Asset Name Resolver
 *
 * Turns a raw asset name plus a descriptor into the ordered identifiers its
 * pattern captures. The resolver only knows about capture groups; what each
 * group means is up to the descriptor's resource type.
 */

import type { AssetTypeDescriptor } from "../types.js";
import { AssetNameMismatchError } from "../errors.js";

export type ResolvedTarget = Readonly<{
  assetName: string;
  identifiers: readonly string[];
}>;

const compiled = new Map<string, RegExp>();

function anchored(pattern: string): RegExp {
  let re = compiled.get(pattern);
  if (!re) {
    re = new RegExp(`^(?:${pattern})$`);
    compiled.set(pattern, re);
  }
  return re;
}

/**
 * Match `assetName` against the whole of `pattern`.
 *
 * @returns The captured groups in order (`""` for a group that did not
 *   participate), or `null` when the name does not match.
 */
export function matchAssetName(pattern: string, assetName: string): string[] | null {
  const match = anchored(pattern).exec(assetName);
  if (!match) return null;
  return match.slice(1).map((group) => group ?? "");
}

export function resolveAssetName(descriptor: AssetTypeDescriptor, assetName: string): ResolvedTarget {
  const identifiers = matchAssetName(descriptor.assetNamePattern, assetName);
  if (!identifiers) {
    throw new AssetNameMismatchError(assetName, descriptor.assetNamePattern);
  }
  return Object.freeze({ assetName, identifiers: Object.freeze(identifiers) });
}
