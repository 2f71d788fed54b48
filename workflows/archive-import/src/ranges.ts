/**
 * @calsync/workflow-archive-import -- Sub-range planning.
 *
 * The archive window runs from the epoch to now + futureDays and is split
 * into consecutive half-open ranges of `months` months. The last range is
 * cut short at the window end.
 */

import { addDays, addMonths, min } from "date-fns";
import {
  ARCHIVE_FUTURE_DAYS,
  ARCHIVE_RANGE_MONTHS,
  DEFAULT_ARCHIVE_EPOCH,
} from "@calsync/shared";

export interface ImportRange {
  readonly timeMin: string;
  readonly timeMax: string;
}

export interface RangePlanOptions {
  /** YYYY-MM-DD, read as midnight UTC. */
  epoch?: string;
  futureDays?: number;
  months?: number;
}

export function planImportRanges(now: Date, options: RangePlanOptions = {}): ImportRange[] {
  const epoch = new Date(`${options.epoch ?? DEFAULT_ARCHIVE_EPOCH}T00:00:00.000Z`);
  const end = addDays(now, options.futureDays ?? ARCHIVE_FUTURE_DAYS);
  const months = options.months ?? ARCHIVE_RANGE_MONTHS;

  const ranges: ImportRange[] = [];
  let cursor = epoch;
  while (cursor < end) {
    const next = min([addMonths(cursor, months), end]);
    ranges.push({ timeMin: cursor.toISOString(), timeMax: next.toISOString() });
    cursor = next;
  }
  return ranges;
}
