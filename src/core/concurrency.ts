import { MS_PER_SECOND, dateOfInstant, utcMidnight } from "./time.js";
import type { ConcurrencyEvent } from "./types.js";

export interface ConcurrencySnapshot {
  /** Start of the grid cell, epoch milliseconds. */
  instant: number;
  activeEngines: number;
  queueLength: number;
}

export interface DailyConcurrency {
  date: string;
  maxActual: number;
  maxOptimal: number;
}

export interface ConcurrencySummary {
  daily: DailyConcurrency[];
  maxActual: number;
  maxActualDates: string[];
  maxOptimal: number;
  maxOptimalDates: string[];
}

export interface ConcurrencyWindow {
  /** YYYY-MM-DD */
  start: string;
  /** YYYY-MM-DD */
  end: string;
  widthSeconds: number;
}

function assertWidth(widthSeconds: number): void {
  if (!Number.isInteger(widthSeconds) || widthSeconds <= 0) {
    throw new RangeError(
      `Snapshot width must be a positive whole number of seconds, got ${widthSeconds}.`,
    );
  }
}

export function snapshotCount(window: ConcurrencyWindow): number {
  assertWidth(window.widthSeconds);
  const spanMs = utcMidnight(window.end) - utcMidnight(window.start);
  return Math.max(0, Math.ceil(spanMs / (window.widthSeconds * MS_PER_SECOND)));
}

/**
 * Replays start/stop events over a fixed grid between the midnights of the
 * first and last dates. Each snapshot holds the state after every event
 * strictly before the end of its cell.
 */
export function* iterateSnapshots(
  events: readonly ConcurrencyEvent[],
  window: ConcurrencyWindow,
): Generator<ConcurrencySnapshot> {
  const count = snapshotCount(window);
  const startMs = utcMidnight(window.start);
  const endMs = utcMidnight(window.end);
  const widthMs = window.widthSeconds * MS_PER_SECOND;

  // Array.prototype.sort is stable, so simultaneous events keep emission order.
  const ordered = events
    .filter((event) => event.instant >= startMs && event.instant <= endMs)
    .sort((left, right) => left.instant - right.instant);

  let activeEngines = 0;
  let queueLength = 0;
  let cursor = 0;

  for (let index = 0; index < count; index += 1) {
    const cellStart = startMs + index * widthMs;
    const cellEnd = cellStart + widthMs;

    for (; cursor < ordered.length; cursor += 1) {
      const event = ordered[cursor];
      if (!event || event.instant >= cellEnd) {
        break;
      }
      if (event.kind === "engine") {
        activeEngines += event.delta;
      } else {
        queueLength += event.delta;
      }
    }

    yield { instant: cellStart, activeEngines, queueLength };
  }
}

export function reconstructConcurrency(
  events: readonly ConcurrencyEvent[],
  window: ConcurrencyWindow,
): ConcurrencySnapshot[] {
  return [...iterateSnapshots(events, window)];
}

export function optimalConcurrency(snapshot: ConcurrencySnapshot): number {
  return snapshot.activeEngines + snapshot.queueLength;
}

export function summarizeConcurrency(
  snapshots: Iterable<ConcurrencySnapshot>,
): ConcurrencySummary {
  const byDate = new Map<string, DailyConcurrency>();

  for (const snapshot of snapshots) {
    const date = dateOfInstant(snapshot.instant);
    const day = byDate.get(date) ?? { date, maxActual: 0, maxOptimal: 0 };
    day.maxActual = Math.max(day.maxActual, snapshot.activeEngines);
    day.maxOptimal = Math.max(day.maxOptimal, optimalConcurrency(snapshot));
    byDate.set(date, day);
  }

  const daily = [...byDate.values()].sort((left, right) =>
    left.date.localeCompare(right.date),
  );

  const maxActual = daily.reduce((max, day) => Math.max(max, day.maxActual), 0);
  const maxOptimal = daily.reduce((max, day) => Math.max(max, day.maxOptimal), 0);

  return {
    daily,
    maxActual,
    maxActualDates: daily.filter((day) => day.maxActual === maxActual).map((day) => day.date),
    maxOptimal,
    maxOptimalDates: daily
      .filter((day) => day.maxOptimal === maxOptimal)
      .map((day) => day.date),
  };
}

/** Reconstructs the grid for the bundle's date span and reduces it in one pass. */
export function analyzeConcurrency(
  events: readonly ConcurrencyEvent[],
  firstDate: string | null,
  lastDate: string | null,
  widthSeconds: number,
): ConcurrencySummary {
  if (firstDate === null || lastDate === null) {
    assertWidth(widthSeconds);
    return summarizeConcurrency([]);
  }

  return summarizeConcurrency(
    iterateSnapshots(events, { start: firstDate, end: lastDate, widthSeconds }),
  );
}
