/**
 * Animation import onto a target skeleton
 */

import {
  Logger,
  PreconditionError,
  type Quat,
  type Vec3,
  type Warning,
} from "@actorx/shared";
import type { PsaDocument, PsaSequence } from "@actorx/format";
import { Skeleton } from "../skeleton/skeleton.js";
import {
  formatMappingWarnings,
  mapBones,
  type BoneMapping,
  type BoneMappingMode,
} from "../skeleton/bone-mapper.js";
import {
  armatureTransforms,
  bindPoseFromArmature,
  convertSequence,
  type ImportBone,
} from "../space/space-converter.js";

const TAG = "AnimationImporter";

export interface SequenceHeader {
  name: string;
  frameCount: number;
}

export interface SequenceMetadata extends SequenceHeader {
  /** Present when metadata writing is enabled */
  fps?: number;
}

/**
 * Receives converted animation. A sequence is always delivered whole:
 * `beginSequence`, its samples, then `endSequence`.
 */
export interface AnimationSink {
  beginSequence(header: SequenceHeader): void;
  /** `boneIndex` is the target skeleton index */
  emitSample(boneIndex: number, frame: number, rotation: Quat, location: Vec3): void;
  endSequence(metadata: SequenceMetadata): void;
}

export interface ImportOptions {
  boneMappingMode: BoneMappingMode;
  /** Sequences to import, by name, in import order */
  sequenceNames: readonly string[];
  namePrefix: string;
  writeKeyframes: boolean;
  writeMetadata: boolean;
  /** Name of the target skeleton in warnings */
  skeletonName: string;
  /** Checked before each sequence starts */
  signal?: AbortSignal;
}

export const DEFAULT_IMPORT_OPTIONS: Readonly<ImportOptions> = Object.freeze({
  boneMappingMode: "case-insensitive",
  sequenceNames: [],
  namePrefix: "",
  writeKeyframes: true,
  writeMetadata: true,
  skeletonName: "target",
});

export interface ImportResult {
  warnings: Warning[];
  importedSequences: string[];
  cancelled: boolean;
}

/**
 * Arena of bones that map onto the target, in source order.
 *
 * A bone's parent is the arena entry of its target parent when that parent
 * is mapped too; otherwise it converts as a root.
 */
export function buildImportBones(target: Skeleton, mapping: BoneMapping): ImportBone[] {
  const armature = armatureTransforms(target.bones);
  const arenaByTarget = new Map<number, number>();
  const bones: ImportBone[] = [];

  for (const [sourceIndex, targetIndex] of [...mapping.mapping].sort((a, b) => a[0] - b[0])) {
    arenaByTarget.set(targetIndex, bones.length);
    bones.push({
      sourceIndex,
      targetIndex,
      parent: null,
      origRotation: [0, 0, 0, 1],
      origLocation: [0, 0, 0],
      postRotation: [0, 0, 0, 1],
    });
  }

  for (const bone of bones) {
    const targetParent = target.parentOf(bone.targetIndex);
    const parent =
      targetParent === null ? undefined : arenaByTarget.get(targetParent);
    bone.parent = parent ?? null;

    const stored = target.bones[bone.targetIndex].storedBindPose;
    const pose =
      stored ??
      bindPoseFromArmature(
        armature[bone.targetIndex],
        targetParent !== null && parent !== undefined ? armature[targetParent] : null,
      );
    bone.origRotation = [...pose.origRotation];
    bone.origLocation = [...pose.origLocation];
    bone.postRotation = [...pose.postRotation];
  }

  return bones;
}

function selectSequences(doc: PsaDocument, names: readonly string[]): PsaSequence[] {
  if (names.length === 0) {
    throw new PreconditionError("no-sequences", "no sequences selected for import");
  }
  return names.map((name) => {
    const sequence = doc.sequences.find((s) => s.name === name);
    if (sequence === undefined) {
      throw new PreconditionError("no-sequences", `sequence "${name}" is not in the document`);
    }
    return sequence;
  });
}

/**
 * Convert the selected sequences to local space and hand them to `sink`.
 *
 * Each sequence is converted in full before anything of it is emitted.
 * Cancellation through `options.signal` takes effect between sequences.
 */
export function importPsa(
  doc: PsaDocument,
  target: Skeleton | null,
  options: Partial<ImportOptions>,
  sink: AnimationSink,
): ImportResult {
  const opts: ImportOptions = { ...DEFAULT_IMPORT_OPTIONS, ...options };
  if (target === null || target.size === 0) {
    throw new PreconditionError("no-target-skeleton", "no target skeleton selected");
  }
  target.validate({ singleRoot: false });
  const sequences = selectSequences(doc, opts.sequenceNames);

  const targetNames = target.names;
  const mapping = mapBones(
    doc.bones.map((bone) => bone.name),
    targetNames,
    opts.boneMappingMode,
  );
  const warnings: Warning[] = formatMappingWarnings(
    mapping,
    targetNames,
    opts.skeletonName,
  );
  for (const warning of warnings) Logger.systemWarn(TAG, warning.message);

  const bones = buildImportBones(target, mapping);
  const importedSequences: string[] = [];
  let cancelled = false;

  for (const sequence of sequences) {
    if (opts.signal?.aborted) {
      cancelled = true;
      break;
    }

    const name = `${opts.namePrefix}${sequence.name}`;
    const samples = opts.writeKeyframes ? convertSequence(bones, sequence.keys) : [];

    sink.beginSequence({ name, frameCount: sequence.frameCount });
    samples.forEach((row, frame) => {
      row.forEach((sample, i) => {
        sink.emitSample(bones[i].targetIndex, frame, sample.rotation, sample.location);
      });
    });
    sink.endSequence({
      name,
      frameCount: sequence.frameCount,
      ...(opts.writeMetadata ? { fps: sequence.fps } : {}),
    });
    importedSequences.push(name);
  }

  const summary = cancelled
    ? `Imported ${importedSequences.length} of ${sequences.length} sequence(s) before cancellation`
    : `Imported ${importedSequences.length} sequence(s)`;
  warnings.push({ kind: "summary", message: summary });
  Logger.system(TAG, `${summary}, ${bones.length} of ${doc.bones.length} bones mapped`);

  return { warnings, importedSequences, cancelled };
}
