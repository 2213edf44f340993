/**
 * Shared fixtures for skeletal pipeline tests
 */

import { expect } from "vitest";
import * as THREE from "three";
import {
  PreconditionError,
  type PreconditionReason,
  type Quat,
  type Vec3,
} from "@actorx/shared";
import type {
  AnimationSink,
  SequenceHeader,
  SequenceMetadata,
  SkeletonBone,
} from "../src/index.js";

export const IDENTITY: Quat = [0, 0, 0, 1];

export function sb(
  name: string,
  parentIndex: number,
  extra: Partial<SkeletonBone> = {},
): SkeletonBone {
  return {
    name,
    parentIndex,
    rotation: [...IDENTITY],
    location: [0, 0, 0],
    ...extra,
  };
}

export function axisAngle(axis: Vec3, angle: number): Quat {
  const q = new THREE.Quaternion().setFromAxisAngle(
    new THREE.Vector3(axis[0], axis[1], axis[2]).normalize(),
    angle,
  );
  return [q.x, q.y, q.z, q.w];
}

export function expectClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], 6));
}

export function expectPrecondition(
  fn: () => unknown,
  reason: PreconditionReason,
): PreconditionError {
  try {
    fn();
  } catch (error) {
    if (!(error instanceof PreconditionError)) throw error;
    expect(error.reason).toBe(reason);
    return error;
  }
  throw new Error(`expected a PreconditionError with reason ${reason}`);
}

export type SinkEvent =
  | { type: "begin"; header: SequenceHeader }
  | { type: "sample"; boneIndex: number; frame: number; rotation: Quat; location: Vec3 }
  | { type: "end"; metadata: SequenceMetadata };

/**
 * Sink that records every call in order
 */
export class RecordingSink implements AnimationSink {
  readonly events: SinkEvent[] = [];
  onEnd?: (metadata: SequenceMetadata) => void;

  beginSequence(header: SequenceHeader): void {
    this.events.push({ type: "begin", header });
  }

  emitSample(boneIndex: number, frame: number, rotation: Quat, location: Vec3): void {
    this.events.push({ type: "sample", boneIndex, frame, rotation, location });
  }

  endSequence(metadata: SequenceMetadata): void {
    this.events.push({ type: "end", metadata });
    this.onEnd?.(metadata);
  }

  samples(): Extract<SinkEvent, { type: "sample" }>[] {
    return this.events.flatMap((event) => (event.type === "sample" ? [event] : []));
  }
}
