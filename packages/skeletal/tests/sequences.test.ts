/**
 * Sequence extraction tests
 */

import { describe, it, expect } from "vitest";
import {
  filterSequenceNames,
  resolveSampleRate,
  segmentOverlaps,
  selectSequencesFromText,
  sequencesFromMarkers,
  sequencesFromSegment,
  sequencesFromSegmentMarkers,
  splitReverseName,
  type TimeSegment,
} from "../src/index.js";

function segment(name: string, frameStart: number, frameEnd: number, extra: Partial<TimeSegment> = {}): TimeSegment {
  return { name, frameStart, frameEnd, ...extra };
}

describe("sequencesFromSegment", () => {
  it("splits a reverse pair into forward and backward ranges", () => {
    expect(sequencesFromSegment(segment("Run/RunBack", 0, 30))).toEqual([
      { name: "Run", frameStart: 0, frameEnd: 30 },
      { name: "RunBack", frameStart: 30, frameEnd: 0 },
    ]);
  });

  it("keeps plain names whole", () => {
    expect(sequencesFromSegment(segment("Idle", 5, 25))).toEqual([
      { name: "Idle", frameStart: 5, frameEnd: 25 },
    ]);
  });

  it("treats malformed pairs as plain names", () => {
    expect(splitReverseName("a/b/c")).toBeNull();
    expect(splitReverseName("/Back")).toBeNull();
    expect(splitReverseName("Fwd/")).toBeNull();
    expect(sequencesFromSegment(segment("a/b/c", 0, 1))).toEqual([
      { name: "a/b/c", frameStart: 0, frameEnd: 1 },
    ]);
  });

  it("skips excluded segments", () => {
    expect(sequencesFromSegment(segment("#Helper", 0, 10))).toEqual([]);
  });

  it("truncates fractional frames", () => {
    expect(sequencesFromSegment(segment("Idle", 1.5, 10.9))).toEqual([
      { name: "Idle", frameStart: 1, frameEnd: 10 },
    ]);
  });
});

describe("segmentOverlaps", () => {
  it("detects a segment covering the window", () => {
    expect(segmentOverlaps(segment("S", 0, 100), 10, 20)).toBe(true);
  });

  it("detects a segment starting or ending inside the window", () => {
    expect(segmentOverlaps(segment("S", 15, 100), 10, 20)).toBe(true);
    expect(segmentOverlaps(segment("S", 0, 20), 10, 20)).toBe(true);
  });

  it("ignores segments that only touch the window edges", () => {
    expect(segmentOverlaps(segment("S", 5, 10), 10, 20)).toBe(false);
    expect(segmentOverlaps(segment("S", 20, 30), 10, 20)).toBe(false);
  });
});

describe("sequencesFromMarkers", () => {
  it("runs each marker to the next and the last to the latest segment end", () => {
    const markers = [
      { name: "C", frame: 60 },
      { name: "A", frame: 0 },
      { name: "B", frame: 30 },
    ];
    expect(sequencesFromMarkers(markers, [segment("Base", 0, 90)])).toEqual([
      { name: "A", frameStart: 0, frameEnd: 30 },
      { name: "B", frameStart: 30, frameEnd: 60 },
      { name: "C", frameStart: 60, frameEnd: 90 },
    ]);
  });

  it("collapses to one frame when no segment overlaps the window", () => {
    const markers = [
      { name: "A", frame: 0 },
      { name: "B", frame: 10 },
    ];
    expect(sequencesFromMarkers(markers, [segment("S", 20, 40)])).toEqual([
      { name: "A", frameStart: 0, frameEnd: 0 },
      { name: "B", frameStart: 10, frameEnd: 40 },
    ]);
  });

  it("tightens the range to the overlapping segments and drops inverted ranges", () => {
    const markers = [
      { name: "A", frame: 0 },
      { name: "B", frame: 100 },
    ];
    expect(sequencesFromMarkers(markers, [segment("S", 10, 50)])).toEqual([
      { name: "A", frameStart: 10, frameEnd: 50 },
    ]);
  });

  it("ignores muted segments", () => {
    expect(
      sequencesFromMarkers([{ name: "A", frame: 0 }], [segment("S", 0, 90, { muted: true })]),
    ).toEqual([{ name: "A", frameStart: 0, frameEnd: 0 }]);
  });

  it("lets excluded markers end their predecessor", () => {
    const markers = [
      { name: "A", frame: 0 },
      { name: "#Stop", frame: 20 },
      { name: "B", frame: 40 },
    ];
    expect(sequencesFromMarkers(markers, [segment("Base", 0, 100)])).toEqual([
      { name: "A", frameStart: 0, frameEnd: 20 },
      { name: "B", frameStart: 40, frameEnd: 100 },
    ]);
  });
});

describe("sequencesFromSegmentMarkers", () => {
  it("runs markers to the next one or the segment end", () => {
    const clip = segment("Clip", 0, 60, {
      markers: [
        { name: "Jump/Land", frame: 40 },
        { name: "Walk", frame: 0 },
        { name: "#Pause", frame: 20 },
      ],
    });
    expect(sequencesFromSegmentMarkers(clip)).toEqual([
      { name: "Walk", frameStart: 0, frameEnd: 20 },
      { name: "Jump", frameStart: 40, frameEnd: 60 },
      { name: "Land", frameStart: 60, frameEnd: 40 },
    ]);
  });

  it("returns nothing for a segment without markers", () => {
    expect(sequencesFromSegmentMarkers(segment("Clip", 0, 60))).toEqual([]);
  });
});

describe("resolveSampleRate", () => {
  const segments = [
    segment("A", 0, 1, { fps: 60 }),
    segment("B", 0, 1, { fps: 25 }),
    segment("C", 0, 1),
  ];

  it("uses the project rate", () => {
    expect(resolveSampleRate({ kind: "project" }, 30, segments)).toBe(30);
  });

  it("uses a custom rate", () => {
    expect(resolveSampleRate({ kind: "custom", fps: 24 }, 30, segments)).toBe(24);
  });

  it("takes the lowest stored rate", () => {
    expect(resolveSampleRate({ kind: "metadata" }, 30, segments)).toBe(25);
  });

  it("falls back to the project rate without stored rates", () => {
    expect(resolveSampleRate({ kind: "metadata" }, 30, [segment("C", 0, 1)])).toBe(30);
  });
});

describe("filterSequenceNames", () => {
  const names = ["Walk", "Run", "WalkBack", "Idle_01"];

  it("matches a plain pattern anywhere in the name", () => {
    expect(filterSequenceNames(names, { pattern: "Walk" })).toEqual(["Walk", "WalkBack"]);
  });

  it("supports wildcards", () => {
    expect(filterSequenceNames(names, { pattern: "?dle" })).toEqual(["Idle_01"]);
    expect(filterSequenceNames(names, { pattern: "W*k" })).toEqual(["Walk", "WalkBack"]);
  });

  it("supports character classes", () => {
    expect(filterSequenceNames(names, { pattern: "[RW]" })).toEqual(["Walk", "Run", "WalkBack"]);
    const takes = ["Idle_01", "Idle_02", "Idle_05"];
    expect(filterSequenceNames(takes, { pattern: "_0[1-3]" })).toEqual(["Idle_01", "Idle_02"]);
    expect(filterSequenceNames(takes, { pattern: "_0[!1]" })).toEqual(["Idle_02", "Idle_05"]);
    expect(filterSequenceNames(["x]y", "xy"], { pattern: "[]]" })).toEqual(["x]y"]);
  });

  it("reads an unclosed bracket literally", () => {
    expect(filterSequenceNames(["a[b", "ab"], { pattern: "a[b" })).toEqual(["a[b"]);
  });

  it("is case-sensitive", () => {
    expect(filterSequenceNames(names, { pattern: "walk" })).toEqual([]);
  });

  it("treats regular expression characters in plain patterns literally", () => {
    expect(filterSequenceNames(["a.b", "axb"], { pattern: "a.b" })).toEqual(["a.b"]);
  });

  it("inverts the match", () => {
    expect(filterSequenceNames(names, { pattern: "Walk", invert: true })).toEqual([
      "Run",
      "Idle_01",
    ]);
  });

  it("anchors regular expressions at the start of the name", () => {
    expect(filterSequenceNames(names, { pattern: "R|Back", regex: true })).toEqual(["Run"]);
  });

  it("filters nothing for an invalid regular expression", () => {
    expect(filterSequenceNames(names, { pattern: "(", regex: true })).toEqual(names);
  });
});

describe("selectSequencesFromText", () => {
  it("selects names listed one per line", () => {
    expect(
      selectSequencesFromText(["Walk", "Run", "Idle"], "Idle\r\nWalk\nJump\n"),
    ).toEqual(["Walk", "Idle"]);
  });
});
