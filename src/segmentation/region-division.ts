import type { DocumentElement, RegionDivision } from '../schemas/document.js';
import { PartitionInvariantError } from '../utils/errors.js';
import type { BodyRegion } from './body-region.js';

/** Length of the run of elements at the start of the list that share the first element's page. */
function leadingPageRun(elements: readonly DocumentElement[]): number {
  const firstPage = elements[0]?.source.page;
  let run = 0;
  for (const element of elements) {
    if (element.source.page !== firstPage) {
      break;
    }
    run++;
  }
  return run;
}

function trailingPageRun(elements: readonly DocumentElement[]): number {
  const lastPage = elements[elements.length - 1]?.source.page;
  let run = 0;
  for (let i = elements.length - 1; i >= 0; i--) {
    if (elements[i]?.source.page !== lastPage) {
      break;
    }
    run++;
  }
  return run;
}

/**
 * Split the element range into head, body and tail around `body`.
 *
 * An empty head is replaced by the elements on the first page and an empty
 * tail by those on the last page, provided the body keeps at least one
 * element. The body shrinks accordingly so the three ranges stay a partition.
 */
export function divideRegions(body: BodyRegion, elements: readonly DocumentElement[]): RegionDivision {
  const total = elements.length;
  if (total === 0) {
    return {
      head: { start_seq: 1, end_seq: 0 },
      body: { start_seq: 1, end_seq: 0 },
      tail: { start_seq: 1, end_seq: 0 },
      method: body.method,
    };
  }

  let start = body.start_seq;
  let end = body.end_seq;

  if (start <= 1) {
    const headEnd = leadingPageRun(elements);
    if (headEnd < end) {
      start = headEnd + 1;
    }
  }

  if (end >= total) {
    const tailStart = total - trailingPageRun(elements) + 1;
    if (tailStart > start) {
      end = tailStart - 1;
    }
  }

  const division: RegionDivision = {
    head: { start_seq: 1, end_seq: start - 1 },
    body: { start_seq: start, end_seq: end },
    tail: { start_seq: end + 1, end_seq: total },
    method: body.method,
  };
  assertPartition(division, total);
  return division;
}

/**
 * Fail loudly unless head, body and tail tile `[1, total]` in order.
 * Empty ranges (`end < start`) are allowed.
 */
export function assertPartition(division: RegionDivision, total: number): void {
  const { head, body, tail } = division;
  const problems: string[] = [];

  if (head.start_seq !== 1) problems.push(`head starts at ${head.start_seq}`);
  if (head.end_seq + 1 !== body.start_seq) problems.push(`head ends at ${head.end_seq} but body starts at ${body.start_seq}`);
  if (body.end_seq + 1 !== tail.start_seq) problems.push(`body ends at ${body.end_seq} but tail starts at ${tail.start_seq}`);
  if (tail.end_seq !== total) problems.push(`tail ends at ${tail.end_seq}, expected ${total}`);
  for (const [name, range] of [['head', head], ['body', body], ['tail', tail]] as const) {
    if (range.end_seq < range.start_seq - 1) problems.push(`${name} range is inverted`);
  }

  if (problems.length > 0) {
    throw new PartitionInvariantError(`Invalid region division: ${problems.join('; ')}`, { division, total });
  }
}
