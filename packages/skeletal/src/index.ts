/**
 * Skeleton reconciliation, sequence extraction and bone-space conversion
 *
 * Builds mesh and animation documents from host data, and imports
 * animation documents onto a host skeleton through a sample sink.
 *
 * @example
 * ```typescript
 * import { readPsaFile } from '@actorx/format';
 * import { Skeleton, importPsa } from '@actorx/skeletal';
 *
 * const doc = await readPsaFile('walk.psa');
 * const result = importPsa(doc, new Skeleton(bones), { sequenceNames: ['Walk'] }, sink);
 * ```
 *
 * @module @actorx/skeletal
 */

export type { SkeletonBone, StoredBindPose, BoneFilter } from "./types.js";

export { Skeleton, selectBones, checkBoneNames } from "./skeleton/skeleton.js";
export { toFileBones, skeletonFromFileBones } from "./skeleton/file-bones.js";
export { mapBones, formatMappingWarnings } from "./skeleton/bone-mapper.js";
export type {
  BoneMapping,
  BoneMappingMode,
  BoneCollision,
} from "./skeleton/bone-mapper.js";

export {
  EXCLUDE_PREFIX,
  isExcluded,
  splitReverseName,
  segmentOverlaps,
  sequencesFromSegment,
  sequencesFromMarkers,
  sequencesFromSegmentMarkers,
} from "./sequences/ranges.js";
export type { TimeMarker, TimeSegment, SequenceRange } from "./sequences/ranges.js";
export {
  resolveSampleRate,
  filterSequenceNames,
  selectSequencesFromText,
} from "./sequences/selection.js";
export type { SampleRateSource, SequenceNameFilter } from "./sequences/selection.js";

export {
  transformFromMatrix,
  bindPoseFromArmature,
  armatureTransforms,
  worldToLocal,
  localToWorld,
  convertSequence,
} from "./space/space-converter.js";
export type { ImportBone } from "./space/space-converter.js";

export {
  buildPsk,
  DEFAULT_MESH_BUILD_OPTIONS,
  DEFAULT_ROOT_BONE_NAME,
} from "./builders/mesh-builder.js";
export type {
  MeshInput,
  MeshCorner,
  MeshTriangle,
  MeshWeight,
  MeshMorph,
  MeshBuildOptions,
} from "./builders/mesh-builder.js";
export {
  buildPsa,
  frameRange,
  sampleFrames,
  DEFAULT_ANIMATION_BUILD_OPTIONS,
} from "./builders/animation-builder.js";
export type {
  ExportSequence,
  SampleCursor,
  SampleSource,
  AnimationInput,
  AnimationBuildOptions,
} from "./builders/animation-builder.js";

export {
  importPsa,
  buildImportBones,
  DEFAULT_IMPORT_OPTIONS,
} from "./import/importer.js";
export type {
  AnimationSink,
  ImportOptions,
  ImportResult,
  SequenceHeader,
  SequenceMetadata,
} from "./import/importer.js";
