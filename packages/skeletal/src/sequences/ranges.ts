/**
 * Named frame ranges from authored segments and timeline markers
 */

/** Segments and markers whose name starts with this are never exported */
export const EXCLUDE_PREFIX = "#";

export interface TimeMarker {
  name: string;
  frame: number;
}

/**
 * An authored animation segment placed on the timeline
 */
export interface TimeSegment {
  name: string;
  frameStart: number;
  frameEnd: number;
  /** Muted segments do not bound marker ranges */
  muted?: boolean;
  /** Sample rate stored with the segment by a previous import */
  fps?: number;
  /** Markers authored inside the segment */
  markers?: readonly TimeMarker[];
}

/**
 * A sequence to export. `frameStart > frameEnd` plays the range backward.
 */
export interface SequenceRange {
  name: string;
  frameStart: number;
  frameEnd: number;
}

export function isExcluded(name: string): boolean {
  return name.startsWith(EXCLUDE_PREFIX);
}

/**
 * Split `"Forward/Backward"` into its two names. Anything other than exactly
 * one separator with text on both sides is not a reverse pair.
 */
export function splitReverseName(name: string): [string, string] | null {
  const parts = name.split("/");
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") return null;
  return [parts[0], parts[1]];
}

function rangesFor(name: string, frameStart: number, frameEnd: number): SequenceRange[] {
  const start = Math.trunc(frameStart);
  const end = Math.trunc(frameEnd);
  const pair = splitReverseName(name);
  if (pair === null) return [{ name, frameStart: start, frameEnd: end }];
  return [
    { name: pair[0], frameStart: start, frameEnd: end },
    { name: pair[1], frameStart: end, frameEnd: start },
  ];
}

/**
 * One sequence for the segment, or a forward/backward pair for `"A/B"` names.
 */
export function sequencesFromSegment(segment: TimeSegment): SequenceRange[] {
  if (isExcluded(segment.name)) return [];
  return rangesFor(segment.name, segment.frameStart, segment.frameEnd);
}

/**
 * Whether a segment touches the window `[a, b]`
 */
export function segmentOverlaps(segment: TimeSegment, a: number, b: number): boolean {
  const s = segment.frameStart;
  const e = segment.frameEnd;
  return (s < a && e > b) || (a <= s && s < b) || (a < e && e <= b);
}

function byFrame(markers: readonly TimeMarker[]): TimeMarker[] {
  return [...markers].sort((a, b) => a.frame - b.frame);
}

/**
 * Ranges for timeline markers.
 *
 * Each marker runs to the next one, tightened to the segments overlapping
 * that window; with no overlapping segment it collapses to a single frame.
 * The last marker runs to the latest segment end. Excluded markers emit
 * nothing but still end their predecessor.
 */
export function sequencesFromMarkers(
  markers: readonly TimeMarker[],
  segments: readonly TimeSegment[],
): SequenceRange[] {
  const sorted = byFrame(markers);
  const live = segments.filter((segment) => !segment.muted);
  const ranges: SequenceRange[] = [];

  sorted.forEach((marker, i) => {
    if (isExcluded(marker.name)) return;

    let frameStart = marker.frame;
    let frameEnd = 0;
    const next = sorted[i + 1];

    if (next !== undefined) {
      frameEnd = next.frame;
      const overlapping = live.filter((segment) =>
        segmentOverlaps(segment, marker.frame, next.frame),
      );
      if (overlapping.length > 0) {
        frameEnd = Math.min(frameEnd, Math.max(...overlapping.map((s) => s.frameEnd)));
        frameStart = Math.max(frameStart, Math.min(...overlapping.map((s) => s.frameStart)));
      } else {
        frameEnd = frameStart;
      }
    } else {
      for (const segment of live) frameEnd = Math.max(frameEnd, segment.frameEnd);
    }

    if (frameStart > frameEnd) return;
    ranges.push({
      name: marker.name,
      frameStart: Math.trunc(frameStart),
      frameEnd: Math.trunc(frameEnd),
    });
  });

  return ranges;
}

/**
 * Ranges for markers authored inside a segment. Each runs to the next marker
 * or to the segment end; `"A/B"` names yield a forward/backward pair.
 */
export function sequencesFromSegmentMarkers(segment: TimeSegment): SequenceRange[] {
  const sorted = byFrame(segment.markers ?? []);
  return sorted.flatMap((marker, i) => {
    if (isExcluded(marker.name)) return [];
    const next = sorted[i + 1];
    const frameEnd = next !== undefined ? next.frame : segment.frameEnd;
    return rangesFor(marker.name, marker.frame, frameEnd);
  });
}
