/**
 * Progress composition: scale a sub-operation's local [0,1] progress into
 * the slice of overall progress reserved for it.
 */

import type { ProgressEvent, ProgressReporter, ProgressUpdate } from "./types";
import { errorMessage } from "./errors";
import { createLogger } from "../util/logger";

const logger = createLogger("progress");

/** Overall progress at which tool execution starts. */
export const EXECUTION_START = 0.3;
/** Share of overall progress divided among the planned calls. */
export const EXECUTION_SPAN = 0.5;

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export class ProgressScaler {
  readonly lo: number;
  readonly hi: number;

  constructor(lo: number, hi: number) {
    if (!(lo >= 0 && hi <= 1 && lo <= hi)) {
      throw new RangeError(`Invalid progress range [${lo}, ${hi}]`);
    }
    this.lo = lo;
    this.hi = hi;
    Object.freeze(this);
  }

  /** Slice for planned call `index` of `count`. */
  static forCall(index: number, count: number): ProgressScaler {
    const lo = EXECUTION_START + (EXECUTION_SPAN * index) / count;
    // Guard the last slice against floating-point overshoot of the span.
    const hi = Math.min(lo + EXECUTION_SPAN / count, EXECUTION_START + EXECUTION_SPAN);
    return new ProgressScaler(lo, hi);
  }

  scale(p: number): number {
    return this.lo + (this.hi - this.lo) * clampUnit(p);
  }
}

/**
 * Local fraction of a downstream progress event. A missing or
 * non-positive total counts as 1.
 */
export function normalizeProgress(event: ProgressEvent): number {
  const total = event.total !== undefined && event.total > 0 ? event.total : 1;
  return clampUnit(event.progress / total);
}

/**
 * Forwards updates so that the reported fraction never decreases and never
 * leaves [0,1], even when concurrent calls interleave their events.
 * A failing reporter is logged and otherwise ignored.
 */
export class MonotonicProgress {
  private last = 0;
  private readonly reporter?: ProgressReporter;

  constructor(reporter?: ProgressReporter) {
    this.reporter = reporter;
  }

  get current(): number {
    return this.last;
  }

  report(fraction: number, message?: string): void {
    this.last = Math.max(this.last, clampUnit(fraction));
    if (!this.reporter) return;

    const update: ProgressUpdate = { fraction: this.last, total: 1, message };
    try {
      this.reporter(update);
    } catch (err) {
      logger.warn(`Progress reporter failed: ${errorMessage(err)}`);
    }
  }
}
