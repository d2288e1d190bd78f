/**
 * Matcher
 *
 * Pairs declared with observed resources by address in linear time.
 */

import { AmbiguousAddressError, DriftError } from "./errors.js";
import { comparePaths } from "./paths.js";
import type { MatchResult, ResourceModel, ResourceOrigin } from "./types.js";

export function match(declared: readonly ResourceModel[], observed: readonly ResourceModel[]): MatchResult {
  const declaredByAddress = indexByAddress(declared, "declared");
  const observedByAddress = indexByAddress(observed, "observed");

  const result: MatchResult = { pairs: [], orphans: [], unmanaged: [] };

  for (const [address, d] of declaredByAddress) {
    const o = observedByAddress.get(address);
    if (o) {
      result.pairs.push({ address, declared: d, observed: o });
    } else {
      result.orphans.push(d);
    }
  }

  for (const [address, o] of observedByAddress) {
    if (!declaredByAddress.has(address)) result.unmanaged.push(o);
  }

  result.pairs.sort((a, b) => comparePaths(a.address, b.address));
  result.orphans.sort(byAddress);
  result.unmanaged.sort(byAddress);
  return result;
}

/**
 * Index resources by address. Every duplicated address is collected before
 * failing so the error names all of them at once.
 */
function indexByAddress(resources: readonly ResourceModel[], origin: ResourceOrigin): Map<string, ResourceModel> {
  const index = new Map<string, ResourceModel>();
  const duplicates = new Set<string>();

  for (const resource of resources) {
    if (resource.origin !== origin) {
      throw new DriftError(
        "ORIGIN_MISMATCH",
        `Resource ${resource.address} has origin ${resource.origin} but was passed as ${origin}`,
      );
    }
    if (index.has(resource.address)) {
      duplicates.add(resource.address);
    } else {
      index.set(resource.address, resource);
    }
  }

  if (duplicates.size > 0) {
    throw new AmbiguousAddressError(origin, [...duplicates].sort(comparePaths));
  }
  return index;
}

function byAddress(a: ResourceModel, b: ResourceModel): number {
  return comparePaths(a.address, b.address);
}
