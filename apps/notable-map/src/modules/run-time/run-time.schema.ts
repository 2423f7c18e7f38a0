import type { DateTime } from "luxon";

/** Wall-clock hour of each scheduled run. */
export const RUN_SLOTS = {
  midday: 12,
  evening: 18,
} as const;

export type RunSlot = keyof typeof RUN_SLOTS;

export const DISPLAY_FORMAT = "yyyy-MM-dd HH:mm ZZZZ";
/** Fixed width and zero padded, so names sort in time order. */
export const FILE_SAFE_FORMAT = "yyyy-MM-dd_HH-mm-ss";
export const RUN_DATE_FORMAT = "yyyy-MM-dd";

export interface RunOverride {
  date?: string;
  slot?: string;
}

export interface RunTime {
  instant: DateTime;
  display: string;
  fileSafe: string;
  mode: "now" | "scheduled";
  slot?: RunSlot;
}

export type Clock = () => DateTime;

export const RUN_CLOCK = Symbol("RUN_CLOCK");

export function isRunSlot(value: string): value is RunSlot {
  return Object.prototype.hasOwnProperty.call(RUN_SLOTS, value);
}
