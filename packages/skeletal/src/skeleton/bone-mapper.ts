/**
 * Name-based bone matching between a source and a target skeleton
 */

import type { MappingWarning } from "@actorx/shared";

export type BoneMappingMode = "exact" | "case-insensitive";

/**
 * A source bone whose target was already taken by an earlier source bone
 */
export interface BoneCollision {
  sourceIndex: number;
  targetIndex: number;
  /** Source bone that claimed the target first */
  claimedBy: number;
}

export interface BoneMapping {
  /** Source bone index -> target bone index */
  mapping: Map<number, number>;
  collisions: BoneCollision[];
  /** Source bone names (as resolved) that no target bone carries */
  unmapped: Set<string>;
  /**
   * One name per source bone: the matched target's spelling when a target
   * matched, the source name otherwise
   */
  resolvedNames: string[];
}

function matcher(mode: BoneMappingMode): (a: string, b: string) => boolean {
  if (mode === "case-insensitive") {
    return (a, b) => a.toLowerCase() === b.toLowerCase();
  }
  return (a, b) => a === b;
}

/**
 * Match each source bone, in index order, to the first target with an equal
 * name. A target can be claimed once; later matches become collisions.
 */
export function mapBones(
  sourceNames: readonly string[],
  targetNames: readonly string[],
  mode: BoneMappingMode,
): BoneMapping {
  const equals = matcher(mode);
  const mapping = new Map<number, number>();
  const claims = new Map<number, number>(); // target -> source
  const collisions: BoneCollision[] = [];
  const resolvedNames: string[] = [];

  sourceNames.forEach((sourceName, sourceIndex) => {
    const targetIndex = targetNames.findIndex((name) => equals(name, sourceName));
    if (targetIndex === -1) {
      resolvedNames.push(sourceName);
      return;
    }

    const claimedBy = claims.get(targetIndex);
    if (claimedBy === undefined) {
      mapping.set(sourceIndex, targetIndex);
      claims.set(targetIndex, sourceIndex);
    } else {
      collisions.push({ sourceIndex, targetIndex, claimedBy });
    }
    resolvedNames.push(targetNames[targetIndex]);
  });

  const targets = new Set(targetNames);
  const unmapped = new Set(resolvedNames.filter((name) => !targets.has(name)));

  return { mapping, collisions, unmapped, resolvedNames };
}

/**
 * One warning per collision, then one listing every unmapped name (sorted).
 */
export function formatMappingWarnings(
  result: BoneMapping,
  targetNames: readonly string[],
  skeletonName: string,
): MappingWarning[] {
  const warnings: MappingWarning[] = result.collisions.map((collision) => ({
    kind: "collision",
    message:
      `Source bone ${collision.sourceIndex} (${result.resolvedNames[collision.sourceIndex]}) ` +
      `could not be mapped to target bone ${collision.targetIndex} (${targetNames[collision.targetIndex]}) ` +
      `because it is already mapped to source bone ${collision.claimedBy} ` +
      `(${result.resolvedNames[collision.claimedBy]})`,
  }));

  if (result.unmapped.size > 0) {
    const names = [...result.unmapped].sort();
    warnings.push({
      kind: "unmapped",
      message:
        `The skeleton '${skeletonName}' is missing ${names.length} bones that exist in the source: ` +
        names.join(", "),
    });
  }

  return warnings;
}
