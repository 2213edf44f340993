/**
 * In-memory documents for skeletal mesh (.psk) and skeletal animation (.psa) files
 *
 * Documents are built completely before they are written, and read completely
 * before anything transforms them.
 */

import type { Vec2, Vec3, Quat, Color } from "@actorx/shared";

/** Index width of wedge and face records */
export type IndexWidth = 16 | 32;

/**
 * A UV-mapped instance of a point
 */
export interface Wedge {
  pointIndex: number;
  u: number;
  v: number;
  materialIndex: number;
}

/**
 * A triangle over three wedges
 */
export interface Face {
  wedgeIndices: [number, number, number];
  materialIndex: number;
  auxMaterialIndex: number;
  smoothingGroups: number;
}

export interface Material {
  name: string;
  textureIndex: number;
  polyFlags: number;
  auxMaterial: number;
  auxFlags: number;
  lodBias: number;
  lodStyle: number;
}

/**
 * A skeleton bone as stored in REFSKELT and BONENAMES.
 *
 * `parentIndex` is -1 for the root. Child rotations are stored conjugated
 * relative to their parent; the root rotation is stored as-is.
 */
export interface Bone {
  name: string;
  flags: number;
  childrenCount: number;
  parentIndex: number;
  rotation: Quat;
  location: Vec3;
  length: number;
  size: Vec3;
}

/**
 * A skinning contribution. Weights of a point are not renormalized.
 */
export interface Weight {
  weight: number;
  pointIndex: number;
  boneIndex: number;
}

export interface MorphInfo {
  name: string;
  vertexCount: number;
}

export interface MorphData {
  positionDelta: Vec3;
  tangentZDelta: Vec3;
  pointIndex: number;
}

/**
 * Skeletal mesh document
 */
export interface PskDocument {
  points: Vec3[];
  wedges: Wedge[];
  faces: Face[];
  materials: Material[];
  bones: Bone[];
  weights: Weight[];
  /** Up to four additional UV channels, one entry per wedge */
  extraUvs: Vec2[][];
  /** One color per wedge */
  vertexColors: Color[];
  /** One normal per wedge */
  vertexNormals: Vec3[];
  morphInfos: MorphInfo[];
  /** Deltas for all morphs, concatenated in morphInfos order */
  morphData: MorphData[];
}

/**
 * One animation sample of one bone
 */
export interface AnimKey {
  location: Vec3;
  rotation: Quat;
  time: number;
}

export interface ScaleKey {
  scale: Vec3;
  time: number;
}

/**
 * A named animation sequence.
 *
 * `keys` is indexed `[frame][bone]` and always has `frameCount` rows of
 * one key per document bone.
 */
export interface PsaSequence {
  name: string;
  group: string;
  rootInclude: number;
  keyCompressionStyle: number;
  keyQuotum: number;
  keyReduction: number;
  trackTime: number;
  fps: number;
  startBone: number;
  frameCount: number;
  keys: AnimKey[][];
}

/**
 * Skeletal animation document
 */
export interface PsaDocument {
  bones: Bone[];
  sequences: PsaSequence[];
  /** Flat optional scale track, in ANIMKEYS order */
  scaleKeys: ScaleKey[];
}

export function createPskDocument(): PskDocument {
  return {
    points: [],
    wedges: [],
    faces: [],
    materials: [],
    bones: [],
    weights: [],
    extraUvs: [],
    vertexColors: [],
    vertexNormals: [],
    morphInfos: [],
    morphData: [],
  };
}

export function createPsaDocument(): PsaDocument {
  return { bones: [], sequences: [], scaleKeys: [] };
}

export function createMaterial(name: string): Material {
  return {
    name,
    textureIndex: 0,
    polyFlags: 0,
    auxMaterial: 0,
    auxFlags: 0,
    lodBias: 0,
    lodStyle: 0,
  };
}
