// src/services/chunking.ts
// What: Boundary-aware chunking with overlap.
// How: Splits text into units (paragraphs; sentences for paragraphs over maxSize; hard splits for sentences over
//      maxSize), then packs adjacent units greedily into chunks of at most maxSize characters. Each chunk after the
//      first re-opens inside the previous chunk's trailing `overlap` characters: at the earliest unit start there,
//      else the earliest sentence start, else the earliest word start. Chunks are exact spans of the input, so
//      callers can map them back to pages by offset.

export interface ChunkOptions {
  maxSize: number;
  overlap: number;
}

export interface ChunkCandidate {
  ordinal: number;
  text: string;
  start: number;
  end: number;
}

interface Span {
  start: number;
  end: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { maxSize: 1500, overlap: 200 };

const WS = /\s/;
const SENTENCE_END = /[.!?]/;
const CLOSER = /["')\]]/;

/**
 * Lazily chunks `text`. The returned iterable can be iterated any number of times; each pass recomputes the
 * chunks from scratch.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): Iterable<ChunkCandidate> {
  const opts = validateChunkOptions(options);
  return { [Symbol.iterator]: () => generateChunks(text, opts) };
}

/** Fills in defaults and throws a RangeError for sizes the chunker cannot honour. */
export function validateChunkOptions(options: Partial<ChunkOptions> = {}): ChunkOptions {
  const opts = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  if (!Number.isInteger(opts.maxSize) || opts.maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${opts.maxSize}`);
  }
  if (!Number.isInteger(opts.overlap) || opts.overlap < 0 || opts.overlap >= opts.maxSize) {
    throw new RangeError(`overlap must be an integer in [0, maxSize), got ${opts.overlap}`);
  }
  return opts;
}

function* generateChunks(text: string, { maxSize, overlap }: ChunkOptions): Generator<ChunkCandidate> {
  const units = toUnits(text, maxSize);
  if (units.length === 0) return;

  let ordinal = 0;
  let next = 0;
  let start = units[0].start;
  while (next < units.length) {
    let last = next;
    while (last + 1 < units.length && units[last + 1].end - start <= maxSize) last++;
    const end = units[last].end;
    yield { ordinal: ordinal++, text: text.slice(start, end), start, end };

    next = last + 1;
    if (next < units.length) {
      start = overlapStart(text, units, next, { start, end }, overlap, maxSize);
    }
  }
}

/**
 * Start offset for the chunk that begins with units[next]. Stays strictly after the previous chunk's start and
 * close enough to units[next].end for that unit to fit.
 */
function overlapStart(
  text: string,
  units: Span[],
  next: number,
  prev: Span,
  overlap: number,
  maxSize: number,
): number {
  const fallback = units[next].start;
  if (overlap === 0) return fallback;

  const lowest = Math.max(prev.end - overlap, units[next].end - maxSize, prev.start + 1);

  let earliest = -1;
  for (let k = next - 1; k >= 0 && units[k].start >= lowest; k--) {
    earliest = units[k].start;
  }
  if (earliest >= 0) return earliest;

  const from = Math.max(lowest, 1);
  for (let p = from; p < prev.end; p++) {
    if (startsSentence(text, p)) return p;
  }
  // One long sentence fills the window: a word start is the only overlap left.
  for (let p = from; p < prev.end; p++) {
    if (startsWord(text, p)) return p;
  }
  return fallback;
}

function startsWord(text: string, p: number): boolean {
  return !WS.test(text[p]) && WS.test(text[p - 1]);
}

/** Same boundary `splitBySentences` cuts at: terminal punctuation, optional closers, then whitespace. */
function startsSentence(text: string, p: number): boolean {
  if (!startsWord(text, p)) return false;
  let q = p - 1;
  while (q >= 0 && WS.test(text[q])) q--;
  while (q >= 0 && CLOSER.test(text[q])) q--;
  return q >= 0 && SENTENCE_END.test(text[q]);
}

function toUnits(text: string, maxSize: number): Span[] {
  const units: Span[] = [];
  for (const para of toParagraphs(text)) {
    if (para.end - para.start <= maxSize) {
      units.push(para);
      continue;
    }
    for (const sentence of splitBySentences(text, para)) {
      if (sentence.end - sentence.start <= maxSize) {
        units.push(sentence);
      } else {
        units.push(...hardSplit(text, sentence, maxSize));
      }
    }
  }
  return units;
}

function toParagraphs(text: string): Span[] {
  return splitSpans(text, { start: 0, end: text.length }, /\n[ \t]*\n\s*/g);
}

function splitBySentences(text: string, para: Span): Span[] {
  return splitSpans(text, para, /(?<=[.!?]["')\]]*)\s+/g);
}

function splitSpans(text: string, within: Span, separator: RegExp): Span[] {
  const out: Span[] = [];
  const slice = text.slice(within.start, within.end);
  let cursor = 0;
  for (const m of slice.matchAll(separator)) {
    const index = m.index ?? 0;
    pushTrimmed(text, within.start + cursor, within.start + index, out);
    cursor = index + m[0].length;
  }
  pushTrimmed(text, within.start + cursor, within.end, out);
  return out;
}

function pushTrimmed(text: string, start: number, end: number, out: Span[]): void {
  let s = start;
  let e = end;
  while (s < e && WS.test(text[s])) s++;
  while (e > s && WS.test(text[e - 1])) e--;
  if (e > s) out.push({ start: s, end: e });
}

function hardSplit(text: string, span: Span, maxSize: number): Span[] {
  const out: Span[] = [];
  let s = span.start;
  while (span.end - s > maxSize) {
    let cut = s + maxSize;
    // Prefer breaking on whitespace in the second half of the window.
    for (let p = cut; p > s + maxSize / 2; p--) {
      if (WS.test(text[p])) {
        cut = p;
        break;
      }
    }
    pushTrimmed(text, s, cut, out);
    s = cut;
    while (s < span.end && WS.test(text[s])) s++;
  }
  pushTrimmed(text, s, span.end, out);
  return out;
}
