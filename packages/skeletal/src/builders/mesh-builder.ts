/**
 * Mesh document assembly from host geometry
 */

import {
  Logger,
  PreconditionError,
  type Color,
  type Vec2,
  type Vec3,
} from "@actorx/shared";
import {
  createMaterial,
  createPskDocument,
  type MorphData,
  type PskDocument,
  type Wedge,
} from "@actorx/format";
import { Skeleton, checkBoneNames, selectBones } from "../skeleton/skeleton.js";
import { toFileBones } from "../skeleton/file-bones.js";
import type { BoneFilter } from "../types.js";

const TAG = "MeshBuilder";

/** Name of the bone written when the mesh has no skeleton */
export const DEFAULT_ROOT_BONE_NAME = "root";

/**
 * One triangle corner
 */
export interface MeshCorner {
  pointIndex: number;
  uv: Vec2;
  extraUvs?: readonly Vec2[];
  color?: Color;
  normal?: Vec3;
}

export interface MeshTriangle {
  corners: [MeshCorner, MeshCorner, MeshCorner];
  /** Index into `MeshInput.materialSlots` */
  materialSlot: number;
  smoothingGroups?: number;
}

export interface MeshWeight {
  pointIndex: number;
  /** Index into the skeleton */
  boneIndex: number;
  weight: number;
}

export interface MeshMorph {
  name: string;
  deltas: readonly MorphData[];
}

export interface MeshInput {
  points: readonly Vec3[];
  /** Material name per slot; null marks a slot with no material */
  materialSlots: readonly (string | null)[];
  triangles: readonly MeshTriangle[];
  skeleton?: Skeleton | null;
  weights?: readonly MeshWeight[];
  morphs?: readonly MeshMorph[];
}

export interface MeshBuildOptions {
  /**
   * Material names in the order they are written. Names the mesh uses but
   * this list omits follow in first-use order.
   */
  materialOrder: readonly string[];
  boneFilter: BoneFilter;
  enforceBoneNames: boolean;
}

export const DEFAULT_MESH_BUILD_OPTIONS: Readonly<MeshBuildOptions> = Object.freeze<MeshBuildOptions>({
  materialOrder: [],
  boneFilter: { mode: "all" },
  enforceBoneNames: false,
});

const WHITE: Color = [255, 255, 255, 255];

function orderMaterials(
  slots: readonly (string | null)[],
  order: readonly string[],
): string[] {
  slots.forEach((slot, i) => {
    if (slot === null) {
      throw new PreconditionError(
        "empty-material-slot",
        `material slot ${i} has no material`,
      );
    }
  });
  const used = slots.filter((slot): slot is string => slot !== null);
  const names = order.filter((name) => used.includes(name));
  for (const name of used) {
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Build a mesh document.
 *
 * Corners sharing point, UV and material become one wedge; the first
 * corner's extra attributes win. Without a skeleton a single root bone is
 * written and every point is weighted fully to it.
 */
export function buildPsk(
  input: MeshInput,
  options: Partial<MeshBuildOptions> = {},
): PskDocument {
  const opts: MeshBuildOptions = { ...DEFAULT_MESH_BUILD_OPTIONS, ...options };
  const doc = createPskDocument();

  const materialNames = orderMaterials(input.materialSlots, opts.materialOrder);
  const slotMaterial = input.materialSlots.map((slot) =>
    slot === null ? -1 : materialNames.indexOf(slot),
  );
  doc.materials = materialNames.map((name) => createMaterial(name));
  doc.points = input.points.map((point): Vec3 => [...point]);

  let extraUvChannels = 0;
  for (const triangle of input.triangles) {
    for (const corner of triangle.corners) {
      extraUvChannels = Math.max(extraUvChannels, corner.extraUvs?.length ?? 0);
    }
  }
  const hasColors = input.triangles.some((t) => t.corners.some((c) => c.color));
  const hasNormals = input.triangles.some((t) => t.corners.some((c) => c.normal));
  doc.extraUvs = Array.from({ length: extraUvChannels }, () => []);

  const wedgeIndex = new Map<string, number>();
  const addWedge = (corner: MeshCorner, materialIndex: number): number => {
    const key = `${corner.pointIndex}|${corner.uv[0]}|${corner.uv[1]}|${materialIndex}`;
    const existing = wedgeIndex.get(key);
    if (existing !== undefined) return existing;

    const wedge: Wedge = {
      pointIndex: corner.pointIndex,
      u: corner.uv[0],
      v: corner.uv[1],
      materialIndex,
    };
    const index = doc.wedges.push(wedge) - 1;
    wedgeIndex.set(key, index);
    doc.extraUvs.forEach((channel, c) => channel.push(corner.extraUvs?.[c] ?? [0, 0]));
    if (hasColors) doc.vertexColors.push(corner.color ?? WHITE);
    if (hasNormals) doc.vertexNormals.push(corner.normal ?? [0, 0, 0]);
    return index;
  };

  for (const triangle of input.triangles) {
    const materialIndex = slotMaterial[triangle.materialSlot] ?? -1;
    if (materialIndex === -1) {
      throw new PreconditionError(
        "empty-material-slot",
        `triangle uses material slot ${triangle.materialSlot}, which does not exist`,
      );
    }
    const [a, b, c] = triangle.corners;
    doc.faces.push({
      wedgeIndices: [
        addWedge(a, materialIndex),
        addWedge(b, materialIndex),
        addWedge(c, materialIndex),
      ],
      materialIndex,
      auxMaterialIndex: 0,
      smoothingGroups: triangle.smoothingGroups ?? 0,
    });
  }

  const skeleton = input.skeleton ?? null;
  if (skeleton !== null && skeleton.size > 0) {
    skeleton.validate();
    const selected = selectBones(skeleton, opts.boneFilter);
    doc.bones = toFileBones(skeleton, selected);
    if (opts.enforceBoneNames) checkBoneNames(doc.bones.map((bone) => bone.name));

    const position = new Map<number, number>();
    selected.forEach((index, i) => position.set(index, i));
    for (const weight of input.weights ?? []) {
      const boneIndex = position.get(weight.boneIndex);
      if (boneIndex === undefined) continue;
      doc.weights.push({ weight: weight.weight, pointIndex: weight.pointIndex, boneIndex });
    }
  } else {
    doc.bones = [
      {
        name: DEFAULT_ROOT_BONE_NAME,
        flags: 0,
        childrenCount: 0,
        parentIndex: -1,
        rotation: [0, 0, 0, 1],
        location: [0, 0, 0],
        length: 0,
        size: [0, 0, 0],
      },
    ];
    doc.weights = doc.points.map((_, pointIndex) => ({ weight: 1, pointIndex, boneIndex: 0 }));
  }

  for (const morph of input.morphs ?? []) {
    doc.morphInfos.push({ name: morph.name, vertexCount: morph.deltas.length });
    for (const delta of morph.deltas) doc.morphData.push(delta);
  }

  Logger.system(
    TAG,
    `Built ${doc.points.length} points, ${doc.wedges.length} wedges, ${doc.faces.length} faces, ` +
      `${doc.materials.length} materials, ${doc.bones.length} bones`,
  );
  return doc;
}
