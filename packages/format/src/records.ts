/**
 * Record layouts and chunk tags for both formats
 */

import type { Vec2, Vec3, Color } from "@actorx/shared";
import type { RecordLayout } from "./binary/chunk.js";
import type {
  AnimKey,
  Bone,
  Face,
  IndexWidth,
  Material,
  MorphData,
  MorphInfo,
  ScaleKey,
  Weight,
  Wedge,
} from "./types.js";

export const PSK_CHUNK = {
  HEADER: "ACTRHEAD",
  POINTS: "PNTS0000",
  WEDGES: "VTXW0000",
  FACES: "FACE0000",
  FACES32: "FACE3200",
  MATERIALS: "MATT0000",
  BONES: "REFSKELT",
  WEIGHTS: "RAWWEIGHTS",
  EXTRA_UVS: "EXTRAUVS", // followed by the channel digit
  VERTEX_COLORS: "VERTEXCOLOR",
  VERTEX_NORMALS: "VTXNORMS",
  MORPH_INFO: "MRPHINFO",
  MORPH_DATA: "MRPHDATA",
} as const;

export const PSA_CHUNK = {
  HEADER: "ANIMHEAD",
  BONES: "BONENAMES",
  SEQUENCES: "ANIMINFO",
  KEYS: "ANIMKEYS",
  SCALE_KEYS: "SCALEKEYS",
} as const;

/** Extra UV channels a mesh may carry */
export const MAX_EXTRA_UV_CHANNELS = 4;

/** Above this many wedges, wedge and face records use 32-bit indices */
export const WEDGE_16_LIMIT = 65536;

export function indexWidthForWedgeCount(count: number): IndexWidth {
  return count > WEDGE_16_LIMIT ? 32 : 16;
}

export const POINT_LAYOUT: RecordLayout<Vec3> = {
  size: 12,
  read: (r) => r.vec3(),
  write: (w, point) => w.vec3(point),
};

export const VEC2_LAYOUT: RecordLayout<Vec2> = {
  size: 8,
  read: (r) => r.vec2(),
  write: (w, uv) => w.vec2(uv),
};

export const COLOR_LAYOUT: RecordLayout<Color> = {
  size: 4,
  read: (r) => [r.u8(), r.u8(), r.u8(), r.u8()],
  write: (w, color) => {
    w.u8(color[0]);
    w.u8(color[1]);
    w.u8(color[2]);
    w.u8(color[3]);
  },
};

/** point u32, u f32, v f32, material u8, reserved u8, padding u16 */
export const WEDGE16_LAYOUT: RecordLayout<Wedge> = {
  size: 16,
  read: (r) => ({
    pointIndex: r.u32(),
    u: r.f32(),
    v: r.f32(),
    materialIndex: r.u8(),
  }),
  write: (w, wedge) => {
    w.u32(wedge.pointIndex);
    w.f32(wedge.u);
    w.f32(wedge.v);
    w.u8(wedge.materialIndex);
    w.skip(3);
  },
};

/** point u32, u f32, v f32, material u32 */
export const WEDGE32_LAYOUT: RecordLayout<Wedge> = {
  size: 16,
  read: (r) => ({
    pointIndex: r.u32(),
    u: r.f32(),
    v: r.f32(),
    materialIndex: r.u32(),
  }),
  write: (w, wedge) => {
    w.u32(wedge.pointIndex);
    w.f32(wedge.u);
    w.f32(wedge.v);
    w.u32(wedge.materialIndex);
  },
};

/** wedges u16[3], material u8, aux material u8, smoothing i32 (naturally aligned) */
export const FACE16_LAYOUT: RecordLayout<Face> = {
  size: 12,
  read: (r) => ({
    wedgeIndices: [r.u16(), r.u16(), r.u16()],
    materialIndex: r.u8(),
    auxMaterialIndex: r.u8(),
    smoothingGroups: r.i32(),
  }),
  write: (w, face) => {
    w.u16(face.wedgeIndices[0]);
    w.u16(face.wedgeIndices[1]);
    w.u16(face.wedgeIndices[2]);
    w.u8(face.materialIndex);
    w.u8(face.auxMaterialIndex);
    w.i32(face.smoothingGroups);
  },
};

/** wedges u32[3], material u8, aux material u8, smoothing i32 (packed) */
export const FACE32_LAYOUT: RecordLayout<Face> = {
  size: 18,
  read: (r) => ({
    wedgeIndices: [r.u32(), r.u32(), r.u32()],
    materialIndex: r.u8(),
    auxMaterialIndex: r.u8(),
    smoothingGroups: r.i32(),
  }),
  write: (w, face) => {
    w.u32(face.wedgeIndices[0]);
    w.u32(face.wedgeIndices[1]);
    w.u32(face.wedgeIndices[2]);
    w.u8(face.materialIndex);
    w.u8(face.auxMaterialIndex);
    w.i32(face.smoothingGroups);
  },
};

export function wedgeLayout(width: IndexWidth): RecordLayout<Wedge> {
  return width === 32 ? WEDGE32_LAYOUT : WEDGE16_LAYOUT;
}

export function faceLayout(width: IndexWidth): RecordLayout<Face> {
  return width === 32 ? FACE32_LAYOUT : FACE16_LAYOUT;
}

export const MATERIAL_LAYOUT: RecordLayout<Material> = {
  size: 88,
  read: (r) => ({
    name: r.name(),
    textureIndex: r.i32(),
    polyFlags: r.i32(),
    auxMaterial: r.i32(),
    auxFlags: r.i32(),
    lodBias: r.i32(),
    lodStyle: r.i32(),
  }),
  write: (w, material) => {
    w.name(material.name);
    w.i32(material.textureIndex);
    w.i32(material.polyFlags);
    w.i32(material.auxMaterial);
    w.i32(material.auxFlags);
    w.i32(material.lodBias);
    w.i32(material.lodStyle);
  },
};

export const BONE_LAYOUT: RecordLayout<Bone> = {
  size: 120,
  read: (r) => ({
    name: r.name(),
    flags: r.i32(),
    childrenCount: r.i32(),
    parentIndex: r.i32(),
    rotation: r.quat(),
    location: r.vec3(),
    length: r.f32(),
    size: r.vec3(),
  }),
  write: (w, bone) => {
    w.name(bone.name);
    w.i32(bone.flags);
    w.i32(bone.childrenCount);
    w.i32(bone.parentIndex);
    w.quat(bone.rotation);
    w.vec3(bone.location);
    w.f32(bone.length);
    w.vec3(bone.size);
  },
};

export const WEIGHT_LAYOUT: RecordLayout<Weight> = {
  size: 12,
  read: (r) => ({
    weight: r.f32(),
    pointIndex: r.i32(),
    boneIndex: r.i32(),
  }),
  write: (w, weight) => {
    w.f32(weight.weight);
    w.i32(weight.pointIndex);
    w.i32(weight.boneIndex);
  },
};

export const MORPH_INFO_LAYOUT: RecordLayout<MorphInfo> = {
  size: 68,
  read: (r) => ({ name: r.name(), vertexCount: r.i32() }),
  write: (w, info) => {
    w.name(info.name);
    w.i32(info.vertexCount);
  },
};

export const MORPH_DATA_LAYOUT: RecordLayout<MorphData> = {
  size: 28,
  read: (r) => ({
    positionDelta: r.vec3(),
    tangentZDelta: r.vec3(),
    pointIndex: r.i32(),
  }),
  write: (w, data) => {
    w.vec3(data.positionDelta);
    w.vec3(data.tangentZDelta);
    w.i32(data.pointIndex);
  },
};

/**
 * ANIMINFO record as stored; `keys` are attached by the reader
 */
export interface SequenceInfo {
  name: string;
  group: string;
  boneCount: number;
  rootInclude: number;
  keyCompressionStyle: number;
  keyQuotum: number;
  keyReduction: number;
  trackTime: number;
  fps: number;
  startBone: number;
  frameStartIndex: number;
  frameCount: number;
}

export const SEQUENCE_INFO_LAYOUT: RecordLayout<SequenceInfo> = {
  size: 168,
  read: (r) => ({
    name: r.name(),
    group: r.name(),
    boneCount: r.i32(),
    rootInclude: r.i32(),
    keyCompressionStyle: r.i32(),
    keyQuotum: r.i32(),
    keyReduction: r.f32(),
    trackTime: r.f32(),
    fps: r.f32(),
    startBone: r.i32(),
    frameStartIndex: r.i32(),
    frameCount: r.i32(),
  }),
  write: (w, info) => {
    w.name(info.name);
    w.name(info.group);
    w.i32(info.boneCount);
    w.i32(info.rootInclude);
    w.i32(info.keyCompressionStyle);
    w.i32(info.keyQuotum);
    w.f32(info.keyReduction);
    w.f32(info.trackTime);
    w.f32(info.fps);
    w.i32(info.startBone);
    w.i32(info.frameStartIndex);
    w.i32(info.frameCount);
  },
};

export const ANIM_KEY_LAYOUT: RecordLayout<AnimKey> = {
  size: 32,
  read: (r) => ({ location: r.vec3(), rotation: r.quat(), time: r.f32() }),
  write: (w, key) => {
    w.vec3(key.location);
    w.quat(key.rotation);
    w.f32(key.time);
  },
};

export const SCALE_KEY_LAYOUT: RecordLayout<ScaleKey> = {
  size: 16,
  read: (r) => ({ scale: r.vec3(), time: r.f32() }),
  write: (w, key) => {
    w.vec3(key.scale);
    w.f32(key.time);
  },
};
