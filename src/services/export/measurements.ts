/**
 * Measurements read from a Fitbit account export
 * (`<dump>/user-site-export/<name>-<date>.json`).
 *
 * Each field listed is written as its own series; the first field is the
 * one checked to tell how much of the measurement is already stored.
 */

import { parseTimestamp } from "../../utils/dates.js";

import type { RawItem } from "../../types/index.js";

export type FieldConverter = (value: number) => number;

export interface ExportMeasurement {
  name: string;
  format: "json" | "csv";
  /** Ordered; the first entry is the reference field */
  fields: readonly [string, FieldConverter][];
  /** Reshape a raw record before its fields are read; null drops it */
  extract?: (item: RawItem) => RawItem | null;
}

const POUNDS_TO_KG = 0.45359;

const toInt: FieldConverter = (value) => Math.trunc(value);
const toFloat: FieldConverter = (value) => value;

function intFields(...names: string[]): [string, FieldConverter][] {
  return names.map((name): [string, FieldConverter] => [name, toInt]);
}

function floatFields(...names: string[]): [string, FieldConverter][] {
  return names.map((name): [string, FieldConverter] => [name, toFloat]);
}

/** Weight records carry the date and the time of day separately */
function joinWeightDateTime(item: RawItem): RawItem | null {
  if (typeof item.date !== "string" || typeof item.time !== "string") {
    return null;
  }
  const { date, time, ...rest } = item;
  return { ...rest, dateTime: `${date} ${time}` };
}

export const EXPORT_MEASUREMENTS: readonly ExportMeasurement[] = [
  { name: "altitude", format: "json", fields: intFields("value") },
  {
    name: "calories",
    format: "json",
    fields: [["value", (value) => Math.trunc(value * 1000)]],
  },
  {
    name: "demographic_vo2_max",
    format: "json",
    fields: floatFields(
      "demographicVO2Max",
      "demographicVO2MaxError",
      "filteredDemographicVO2Max",
      "filteredDemographicVO2MaxError"
    ),
  },
  { name: "distance", format: "json", fields: intFields("value") },
  {
    name: "estimated_oxygen_variation",
    format: "csv",
    fields: intFields("value"),
  },
  {
    name: "heart_rate",
    format: "json",
    fields: intFields("bpm", "confidence"),
  },
  { name: "lightly_active_minutes", format: "json", fields: intFields("value") },
  {
    name: "moderately_active_minutes",
    format: "json",
    fields: intFields("value"),
  },
  {
    name: "resting_heart_rate",
    format: "json",
    fields: floatFields("value", "error"),
  },
  {
    name: "run_vo2_max",
    format: "json",
    fields: floatFields(
      "runVO2Max",
      "runVO2MaxError",
      "filteredRunVO2Max",
      "filteredRunVO2MaxError"
    ),
  },
  { name: "sedentary_minutes", format: "json", fields: floatFields("value") },
  {
    name: "swim_lengths_data",
    format: "json",
    fields: intFields("lapDurationSec", "strokeCount"),
  },
  { name: "very_active_minutes", format: "json", fields: intFields("value") },
  {
    name: "weight",
    format: "json",
    extract: joinWeightDateTime,
    fields: [
      ["bmi", toFloat],
      ["fat", toFloat],
      ["weight", (value) => value * POUNDS_TO_KG],
    ],
  },
];

// ============================================================================
// Timestamps
// ============================================================================

const EXPORT_TIMESTAMP = /^(\d{2})\/(\d{2})\/(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Export timestamps look like "01/15/20 08:00:00" (MM/DD/YY, UTC). ISO
 * strings are accepted too; anything else is null.
 */
export function parseExportTimestamp(value: string): Date | null {
  const match = EXPORT_TIMESTAMP.exec(value.trim());
  if (!match) {
    return parseTimestamp(value);
  }

  const [, month, day, year, hours, minutes, seconds] = match.map(Number);
  if (
    month === undefined ||
    day === undefined ||
    year === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const timestamp = new Date(
    Date.UTC(2000 + year, month - 1, day, hours, minutes, seconds)
  );
  // Reject rollovers such as 02/30
  return timestamp.getUTCMonth() === month - 1 &&
    timestamp.getUTCDate() === day
    ? timestamp
    : null;
}
