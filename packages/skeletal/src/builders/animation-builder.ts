/**
 * Animation document assembly from sampled host animation
 */

import {
  Logger,
  PreconditionError,
  type Quat,
  type Transform,
} from "@actorx/shared";
import {
  createPsaDocument,
  type AnimKey,
  type PsaDocument,
} from "@actorx/format";
import { Skeleton, checkBoneNames, selectBones } from "../skeleton/skeleton.js";
import { toFileBones } from "../skeleton/file-bones.js";
import type { BoneFilter } from "../types.js";

const TAG = "AnimationBuilder";

/**
 * A sequence to sample. `frameStart > frameEnd` samples backward.
 */
export interface ExportSequence {
  name: string;
  frameStart: number;
  frameEnd: number;
  fps: number;
  group?: string;
  /** Share of the range's frames to sample, in (0, 1]. Defaults to 1. */
  compressionRatio?: number;
  /** Fewest frames to sample, however small the range. Defaults to 0. */
  keyQuota?: number;
}

/**
 * Pull-style sample stream for one sequence. Each sample holds one
 * parent-relative transform per skeleton bone, in skeleton order.
 */
export interface SampleCursor {
  nextSample(): readonly Transform[] | undefined;
}

export interface SampleSource {
  /** Open a cursor that yields samples for `frames`, in that order */
  open(sequence: ExportSequence, frames: readonly number[]): SampleCursor;
}

export interface AnimationInput {
  skeleton: Skeleton | null;
  sequences: readonly ExportSequence[];
  source: SampleSource;
}

export interface AnimationBuildOptions {
  namePrefix: string;
  nameSuffix: string;
  boneFilter: BoneFilter;
  enforceBoneNames: boolean;
}

export const DEFAULT_ANIMATION_BUILD_OPTIONS: Readonly<AnimationBuildOptions> =
  Object.freeze<AnimationBuildOptions>({
    namePrefix: "",
    nameSuffix: "",
    boneFilter: { mode: "all" },
    enforceBoneNames: false,
  });

/**
 * Frames from `start` to `end` inclusive, stepping backward when `start > end`.
 */
export function frameRange(start: number, end: number): number[] {
  const step = start <= end ? 1 : -1;
  const frames: number[] = [];
  for (let frame = start; frame !== end + step; frame += step) frames.push(frame);
  return frames;
}

/**
 * Frames to sample for `sequence` and the rate that keeps its duration.
 *
 * The frame count is the range's inclusive length scaled by
 * `compressionRatio` (truncated), raised to `keyQuota`, and never below one.
 * Samples are spread evenly from `frameStart` to `frameEnd`, so they fall on
 * fractional frames whenever the count differs from the range's length.
 */
export function sampleFrames(sequence: ExportSequence): { frames: number[]; fps: number } {
  const extent = Math.abs(sequence.frameEnd - sequence.frameStart);
  const rangeCount = extent + 1;
  const count = Math.max(
    1,
    sequence.keyQuota ?? 0,
    Math.trunc(rangeCount * (sequence.compressionRatio ?? 1)),
  );
  if (count === rangeCount) {
    return { frames: frameRange(sequence.frameStart, sequence.frameEnd), fps: sequence.fps };
  }

  const direction = sequence.frameStart <= sequence.frameEnd ? 1 : -1;
  const step = count > 1 ? (direction * extent) / (count - 1) : 0;
  const frames = Array.from({ length: count }, (_, i) => sequence.frameStart + i * step);
  return { frames, fps: (count * sequence.fps) / rangeCount };
}

function conjugate(q: Readonly<Quat>): Quat {
  return [-q[0], -q[1], -q[2], q[3]];
}

function checkSequences(
  sequences: readonly ExportSequence[],
  opts: AnimationBuildOptions,
): string[] {
  const names = new Set<string>();
  return sequences.map((sequence) => {
    if (!Number.isInteger(sequence.frameStart) || !Number.isInteger(sequence.frameEnd)) {
      throw new PreconditionError(
        "invalid-range",
        `sequence "${sequence.name}" has a non-integer frame range ${sequence.frameStart}..${sequence.frameEnd}`,
      );
    }
    if (!(sequence.fps > 0)) {
      throw new PreconditionError(
        "invalid-range",
        `sequence "${sequence.name}" has sample rate ${sequence.fps}`,
      );
    }
    const ratio = sequence.compressionRatio ?? 1;
    if (!(ratio > 0 && ratio <= 1)) {
      throw new PreconditionError(
        "invalid-range",
        `sequence "${sequence.name}" has compression ratio ${ratio}`,
      );
    }
    const quota = sequence.keyQuota ?? 0;
    if (!Number.isInteger(quota) || quota < 0) {
      throw new PreconditionError(
        "invalid-range",
        `sequence "${sequence.name}" has key quota ${quota}`,
      );
    }
    const name = `${opts.namePrefix}${sequence.name}${opts.nameSuffix}`;
    if (names.has(name)) {
      throw new PreconditionError(
        "duplicate-sequence",
        `more than one sequence is named "${name}"`,
      );
    }
    names.add(name);
    return name;
  });
}

/**
 * Build an animation document by sampling every sequence through `source`.
 *
 * Keys follow the file convention: the root rotation as sampled, child
 * rotations conjugated.
 */
export function buildPsa(
  input: AnimationInput,
  options: Partial<AnimationBuildOptions> = {},
): PsaDocument {
  const opts: AnimationBuildOptions = { ...DEFAULT_ANIMATION_BUILD_OPTIONS, ...options };
  const skeleton = input.skeleton;
  if (skeleton === null || skeleton.size === 0) {
    throw new PreconditionError("no-target-skeleton", "no skeleton to animate");
  }
  if (input.sequences.length === 0) {
    throw new PreconditionError("no-sequences", "no sequences selected for export");
  }
  skeleton.validate();

  const names = checkSequences(input.sequences, opts);
  const selected = selectBones(skeleton, opts.boneFilter);
  const doc = createPsaDocument();
  doc.bones = toFileBones(skeleton, selected);
  if (opts.enforceBoneNames) checkBoneNames(doc.bones.map((bone) => bone.name));

  input.sequences.forEach((sequence, s) => {
    const { frames, fps } = sampleFrames(sequence);
    const cursor = input.source.open(sequence, frames);
    const keys: AnimKey[][] = [];

    for (let f = 0; f < frames.length; f++) {
      const sample = cursor.nextSample();
      if (sample === undefined) {
        throw new PreconditionError(
          "invalid-range",
          `sample source for "${sequence.name}" ended after ${f} of ${frames.length} frames`,
        );
      }
      if (sample.length !== skeleton.size) {
        throw new PreconditionError(
          "invalid-range",
          `sample ${f} of "${sequence.name}" has ${sample.length} transforms for ${skeleton.size} bones`,
        );
      }
      keys.push(
        selected.map((boneIndex, i): AnimKey => {
          const transform = sample[boneIndex];
          const isRoot = doc.bones[i].parentIndex === -1;
          return {
            location: [...transform.location],
            rotation: isRoot ? [...transform.rotation] : conjugate(transform.rotation),
            time: 1,
          };
        }),
      );
    }

    doc.sequences.push({
      name: names[s],
      group: sequence.group ?? "",
      rootInclude: 0,
      keyCompressionStyle: 0,
      keyQuotum: frames.length * selected.length,
      keyReduction: 1,
      trackTime: frames.length,
      fps,
      startBone: 0,
      frameCount: frames.length,
      keys,
    });
  });

  Logger.system(
    TAG,
    `Built ${doc.sequences.length} sequences over ${doc.bones.length} bones`,
  );
  return doc;
}
