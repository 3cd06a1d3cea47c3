/**
 * Recursive separator-aware text splitter.
 *
 * Text is cut on the first separator from {@link SEPARATORS} that occurs in
 * it (paragraph, line, sentence, word, then single characters). Pieces keep
 * their trailing separator, so every chunk is an exact substring of the
 * input and consecutive chunks cover it without gaps. Pieces are merged
 * greedily up to `size` characters; each new chunk starts with the trailing
 * pieces of its predecessor that fit in `overlap` characters. Pieces that are
 * themselves longer than `size` are split again with the next separator.
 */

export const SEPARATORS = ["\n\n", "\n", ". ", " ", ""] as const;

/** A chunk with its half-open character range in the source text. */
export interface TextSpan {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

interface Range {
  start: number;
  end: number;
}

function assertParams(size: number, overlap: number): void {
  if (!Number.isInteger(size) || !Number.isInteger(overlap) || overlap < 0 || size <= overlap) {
    throw new RangeError(`Chunk params require size > overlap >= 0 (got ${size} / ${overlap})`);
  }
}

/** Cut `text[range]` into pieces ending with `sep` (single characters for ""). */
function cutPieces(text: string, range: Range, sep: string): Range[] {
  const pieces: Range[] = [];
  if (sep === "") {
    for (let i = range.start; i < range.end; i++) pieces.push({ start: i, end: i + 1 });
    return pieces;
  }
  let from = range.start;
  while (from < range.end) {
    const hit = text.indexOf(sep, from);
    const end = hit === -1 || hit + sep.length > range.end ? range.end : hit + sep.length;
    pieces.push({ start: from, end });
    from = end;
  }
  return pieces;
}

function* splitRange(
  text: string,
  range: Range,
  size: number,
  overlap: number,
  level: number,
): Generator<Range> {
  const segment = text.slice(range.start, range.end);
  let sepLevel = level;
  while (sepLevel < SEPARATORS.length - 1 && !segment.includes(SEPARATORS[sepLevel])) sepLevel++;
  const pieces = cutPieces(text, range, SEPARATORS[sepLevel]);

  let window: Range[] = [];
  let windowLen = 0;
  const flush = (): Range | null =>
    window.length ? { start: window[0].start, end: window[window.length - 1].end } : null;

  for (const piece of pieces) {
    const len = piece.end - piece.start;
    if (len > size) {
      const merged = flush();
      if (merged) yield merged;
      window = [];
      windowLen = 0;
      yield* splitRange(text, piece, size, overlap, sepLevel + 1);
      continue;
    }
    if (window.length && windowLen + len > size) {
      const merged = flush();
      if (merged) yield merged;
      while (window.length && (windowLen > overlap || windowLen + len > size)) {
        const dropped = window.shift();
        if (dropped) windowLen -= dropped.end - dropped.start;
      }
    }
    window.push(piece);
    windowLen += len;
  }
  const tail = flush();
  if (tail) yield tail;
}

/**
 * Split text into overlapping spans. The returned iterable is lazy and can be
 * iterated any number of times; each pass yields the same sequence.
 * Empty input yields nothing.
 */
export function splitSpans(text: string, size: number, overlap: number): Iterable<TextSpan> {
  assertParams(size, overlap);
  return {
    *[Symbol.iterator]() {
      if (!text.length) return;
      for (const r of splitRange(text, { start: 0, end: text.length }, size, overlap, 0)) {
        yield { text: text.slice(r.start, r.end), start: r.start, end: r.end };
      }
    },
  };
}

/** Chunk strings only; order defines each chunk's index within its file. */
export function splitChunks(text: string, size = 1000, overlap = 200): Iterable<string> {
  const spans = splitSpans(text, size, overlap);
  return {
    *[Symbol.iterator]() {
      for (const span of spans) yield span.text;
    },
  };
}
