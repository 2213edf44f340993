/**
 * Sample rate resolution and sequence name selection
 */

import type { TimeSegment } from "./ranges.js";

export type SampleRateSource =
  | { kind: "project" }
  | { kind: "custom"; fps: number }
  | { kind: "metadata" };

/**
 * Sample rate for a sequence built from `segments`.
 *
 * "metadata" takes the lowest rate stored on those segments and falls back
 * to the project rate when none carries one.
 */
export function resolveSampleRate(
  source: SampleRateSource,
  projectRate: number,
  segments: readonly TimeSegment[],
): number {
  switch (source.kind) {
    case "project":
      return projectRate;
    case "custom":
      return source.fps;
    case "metadata": {
      const rates = segments.flatMap((segment) =>
        typeof segment.fps === "number" && Number.isFinite(segment.fps)
          ? [segment.fps]
          : [],
      );
      return rates.length > 0 ? Math.min(...rates) : projectRate;
    }
  }
}

export interface SequenceNameFilter {
  pattern: string;
  /** Regular expressions match from the start of the name */
  regex?: boolean;
  invert?: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Shell-style pattern: `*`, `?`, and `[seq]` / `[!seq]` classes. A `[`
 * without a closing `]` is literal, and a `]` right after the opening
 * bracket belongs to the class.
 */
function globToRegExp(glob: string): RegExp {
  let source = "";
  let i = 0;
  while (i < glob.length) {
    const char = glob[i++];
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      let end = i;
      if (glob[end] === "!") end++;
      if (glob[end] === "]") end++;
      end = glob.indexOf("]", end);
      if (end === -1) {
        source += "\\[";
        continue;
      }
      let body = glob.slice(i, end);
      i = end + 1;
      const negate = body.startsWith("!");
      if (negate) body = body.slice(1);
      source += `[${negate ? "^" : ""}${body.replace(/[\\\]^]/g, "\\$&")}]`;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, "s");
}

function compile(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    return null;
  }
}

/**
 * Names passing `filter`, in input order.
 *
 * A plain pattern matches anywhere in the name, with `*`, `?` and `[...]`
 * wildcards.
 * An invalid regular expression filters nothing out.
 */
export function filterSequenceNames(
  names: readonly string[],
  filter: SequenceNameFilter,
): string[] {
  let test: (name: string) => boolean;
  if (filter.regex) {
    const regex = compile(filter.pattern);
    test = regex === null ? () => true : (name) => regex.exec(name)?.index === 0;
  } else {
    const glob = globToRegExp(`*${filter.pattern}*`);
    test = (name) => glob.test(name);
  }
  return names.filter((name) => test(name) !== Boolean(filter.invert));
}

/**
 * Names listed in `text`, one per line, in input order.
 */
export function selectSequencesFromText(
  names: readonly string[],
  text: string,
): string[] {
  const lines = new Set(text.split(/\r?\n/));
  return names.filter((name) => lines.has(name));
}
