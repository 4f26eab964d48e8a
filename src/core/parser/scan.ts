import { ParseError } from "../../lib/errors.js";

/**
 * Bracketed constructs whose contents are opaque to line, cell and argument
 * splitting. Longest opener first so `{{{` wins over `{{`.
 */
const CONSTRUCTS = [
  { open: "{{{", close: "}}}" },
  { open: "{{", close: "}}" },
  { open: "[[", close: "]]" },
] as const;

type Construct = (typeof CONSTRUCTS)[number];

/**
 * Matching end (or -1) and nesting height of the construct opening at each index
 */
interface BracketIndex {
  ends: Int32Array;
  heights: Int32Array;
}

const INDEX_CACHE_LIMIT = 64;
const indexCache = new Map<string, BracketIndex>();

export function constructAt(source: string, index: number): Construct | undefined {
  return CONSTRUCTS.find((c) => source.startsWith(c.open, index));
}

/**
 * Resolve every opener from right to left, so the scan for an opener skips
 * over constructs that start after it in one step. Unclosed openers are
 * resolved once and then read as plain characters.
 */
function buildIndex(source: string): BracketIndex {
  const ends = new Int32Array(source.length).fill(-1);
  const heights = new Int32Array(source.length);

  for (let start = source.length - 1; start >= 0; start--) {
    const construct = constructAt(source, start);
    if (construct === undefined) {
      continue;
    }

    let height = 0;
    let j = start + construct.open.length;
    while (j < source.length) {
      if (source.startsWith(construct.close, j)) {
        ends[start] = j + construct.close.length;
        heights[start] = height + 1;
        break;
      }
      const nested = ends[j] ?? -1;
      if (nested !== -1) {
        height = Math.max(height, heights[j] ?? 0);
        j = nested;
        continue;
      }
      j++;
    }
  }

  return { ends, heights };
}

function bracketIndex(source: string): BracketIndex {
  const cached = indexCache.get(source);
  if (cached !== undefined) {
    return cached;
  }
  if (indexCache.size >= INDEX_CACHE_LIMIT) {
    indexCache.clear();
  }
  const index = buildIndex(source);
  indexCache.set(source, index);
  return index;
}

/**
 * Index just past the construct that opens at `start`, or -1 when it never closes.
 *
 * @throws ParseError when closed constructs nest deeper than `maxNesting`
 */
export function findConstructEnd(source: string, start: number, maxNesting: number): number {
  const index = bracketIndex(source);
  const end = index.ends[start] ?? -1;
  if (end !== -1 && (index.heights[start] ?? 0) > maxNesting) {
    throw new ParseError(`Constructs nested deeper than ${maxNesting} levels`, source, {
      offset: start,
    });
  }
  return end;
}

/**
 * First index of `needle` outside any bracketed construct
 */
export function indexOfTopLevel(
  source: string,
  needle: string,
  maxNesting: number,
  from = 0
): number {
  let j = from;
  while (j < source.length) {
    if (constructAt(source, j) !== undefined) {
      const end = findConstructEnd(source, j, maxNesting);
      if (end !== -1) {
        j = end;
        continue;
      }
    }
    if (source.startsWith(needle, j)) {
      return j;
    }
    j++;
  }
  return -1;
}

/**
 * Split on any of `separators` where they occur outside bracketed constructs
 */
export function splitTopLevel(source: string, separators: string[], maxNesting: number): string[] {
  const parts: string[] = [];
  let last = 0;
  let j = 0;

  while (j < source.length) {
    if (constructAt(source, j) !== undefined) {
      const end = findConstructEnd(source, j, maxNesting);
      if (end !== -1) {
        j = end;
        continue;
      }
    }
    const separator = separators.find((s) => source.startsWith(s, j));
    if (separator !== undefined) {
      parts.push(source.slice(last, j));
      j += separator.length;
      last = j;
    } else {
      j++;
    }
  }

  parts.push(source.slice(last));
  return parts;
}

/**
 * Split into logical lines. A newline inside a closed bracketed construct
 * (a template call spread over several lines, say) does not end the line.
 */
export function splitLogicalLines(source: string, maxNesting: number): string[] {
  return splitTopLevel(source, ["\n"], maxNesting);
}
