import type { CalendarEventV1, EiConfigV1 } from "@ews/contracts";

/**
 * Returns the reference instant (unix ms) used for time-of-day and calendar
 * lookups of a sample. Injected so TI/EI are testable with fixed inputs.
 */
export type Clock = (sampleTs: number) => number;

/** Live feeds: the wall clock at ingestion time. */
export const wallClock: Clock = () => Date.now();

/** Replays: the sample's own timestamp. */
export const sampleClock: Clock = (sampleTs) => sampleTs;

export function fixedClock(ts: number): Clock {
  return () => ts;
}

export interface EventCalendar {
  /** Highest intensity of events active at `ts`, or null when none is. */
  intensityAt(ts: number): number | null;
}

type CompiledEvent = { name: string; startTs: number; endTs: number; intensity: number };

/** Calendar backed by the `indices.ei.calendar` config block. Windows are [start, end). */
export class StaticEventCalendar implements EventCalendar {
  private readonly events: CompiledEvent[];

  constructor(events: ReadonlyArray<CalendarEventV1>) {
    this.events = events
      .map((e) => ({ name: e.name, startTs: Date.parse(e.start), endTs: Date.parse(e.end), intensity: e.intensity }))
      .filter((e) => Number.isFinite(e.startTs) && Number.isFinite(e.endTs) && e.endTs > e.startTs)
      .sort((a, b) => a.startTs - b.startTs);
  }

  intensityAt(ts: number): number | null {
    let best: number | null = null;
    for (const e of this.events) {
      if (e.startTs > ts) break;
      if (ts < e.endTs && (best === null || e.intensity > best)) best = e.intensity;
    }
    return best;
  }
}

export function calendarFromConfig(ei: EiConfigV1): EventCalendar {
  return new StaticEventCalendar(ei.calendar);
}

/** Reference context handed to the index computation for one sample. */
export type IndexContext = {
  referenceTs: number;
  calendar: EventCalendar;
};
