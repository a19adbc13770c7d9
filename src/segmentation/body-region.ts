/**
 * Body-region detection.
 *
 * First-chapter headings open brackets and reference headings close them.
 * A table of contents produces a tight pair near the front; the real body
 * produces the widest pair. When nothing pairs up, a chain of fallbacks
 * picks the boundaries from whatever evidence exists.
 */

import type { BodyRegionMethod } from '../schemas/document.js';
import type { MarkerIndex, TitleItem } from './marker-index.js';

export interface BodyRegion {
  start_seq: number;
  end_seq: number;
  method: BodyRegionMethod;
}

export interface BracketPair {
  open: number;
  close: number;
}

interface BracketEvent {
  seq: number;
  kind: 'open' | 'close';
}

/**
 * Pair opens with closes using a stack. Events are visited in sequence
 * order with opens before closes at the same position; a close with no
 * pending open is ignored.
 */
export function collectBracketPairs(opens: readonly number[], closes: readonly number[]): BracketPair[] {
  const events: BracketEvent[] = [
    ...opens.map(seq => ({ seq, kind: 'open' as const })),
    ...closes.map(seq => ({ seq, kind: 'close' as const })),
  ].sort((a, b) => a.seq - b.seq || (a.kind === b.kind ? 0 : a.kind === 'open' ? -1 : 1));

  const stack: number[] = [];
  const pairs: BracketPair[] = [];
  for (const event of events) {
    if (event.kind === 'open') {
      stack.push(event.seq);
      continue;
    }
    const open = stack.pop();
    if (open !== undefined) {
      pairs.push({ open, close: event.seq });
    }
  }
  return pairs;
}

/**
 * The widest bracket pair; on equal spans the earliest-starting pair wins.
 *
 * @returns The selected pair, or null when no open ever met a close
 */
export function pairBodyBrackets(opens: readonly number[], closes: readonly number[]): BracketPair | null {
  let best: BracketPair | null = null;
  for (const pair of collectBracketPairs(opens, closes)) {
    if (best === null) {
      best = pair;
      continue;
    }
    const span = pair.close - pair.open;
    const bestSpan = best.close - best.open;
    if (span > bestSpan || (span === bestSpan && pair.open < best.open)) {
      best = pair;
    }
  }
  return best;
}

/**
 * Widest span between two titles that both come after the last TOC marker.
 */
export function widestTitleSpan(titles: readonly TitleItem[], afterSeq: number): BracketPair | null {
  const eligible = titles.filter(title => title.seq > afterSeq).map(title => title.seq);
  let best: BracketPair | null = null;
  for (let i = 0; i < eligible.length; i++) {
    for (let j = i + 1; j < eligible.length; j++) {
      const open = eligible[i];
      const close = eligible[j];
      if (open === undefined || close === undefined) {
        continue;
      }
      if (best === null || close - open > best.close - best.open) {
        best = { open, close };
      }
    }
  }
  return best;
}

function last(seqs: readonly number[]): number | undefined {
  return seqs[seqs.length - 1];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function fallbackBodyRegion(index: MarkerIndex, total: number): BodyRegion {
  const lastRef = last(index.references);
  const lastTail = last(index.tailStart);
  const lastToc = last(index.tableOfContents) ?? 0;

  let end = total;
  if (lastRef !== undefined) {
    end = Math.max(1, lastRef - 1);
  } else if (lastTail !== undefined) {
    end = Math.max(1, lastTail - 1);
  }

  const candidate = index.minorBodyStart.find(seq => seq > lastToc && seq <= end);
  if (candidate !== undefined) {
    return { start_seq: candidate, end_seq: end, method: 'fallback' };
  }

  if (lastRef !== undefined || lastTail !== undefined) {
    return { start_seq: 1, end_seq: end, method: 'fallback' };
  }

  const span = widestTitleSpan(index.titles, lastToc);
  if (span !== null) {
    return { start_seq: span.open, end_seq: span.close, method: 'title_span' };
  }

  return { start_seq: 1, end_seq: end, method: 'default' };
}

/**
 * Locate the body region of a document with `total` elements.
 * Never throws for missing evidence; `method` records which rule decided.
 */
export function detectBodyRegion(index: MarkerIndex, total: number): BodyRegion {
  if (total <= 0) {
    return { start_seq: 1, end_seq: 0, method: 'default' };
  }
  if (!index.hasEvidence) {
    return { start_seq: 1, end_seq: total, method: 'default' };
  }

  const pair = pairBodyBrackets(index.majorBodyStart, index.references);
  const region: BodyRegion = pair !== null
    ? { start_seq: pair.open, end_seq: Math.max(1, pair.close - 1), method: 'paired' }
    : fallbackBodyRegion(index, total);

  // front matter and TOC stay in the head
  const headMarkers = [...index.frontMatter, ...index.tableOfContents];
  if (headMarkers.length > 0) {
    const afterHead = Math.max(...headMarkers) + 1;
    if (afterHead <= region.end_seq) {
      region.start_seq = Math.max(region.start_seq, afterHead);
    }
  }

  const start = clamp(region.start_seq, 1, total);
  const end = clamp(region.end_seq, start, total);
  return { start_seq: start, end_seq: end, method: region.method };
}
