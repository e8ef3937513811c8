/**
 * Record Transformer - Raw source items to flat time-series points
 *
 * Pure functions, no I/O. Every transform is total: a missing nested
 * structure drops the points it would have produced, an unreadable
 * timestamp drops the item, and nothing throws.
 */

import { parseTimestamp } from "../../utils/dates.js";

import type {
  CompositeTransformName,
  MeasurementFamily,
  SeriesSpec,
} from "./families.js";
import type {
  PointValue,
  RawItem,
  RawPayload,
  TimeSeriesPoint,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/** A point before the writer attaches identity tags */
export interface PointDraft {
  measurement: string;
  series: string;
  timestamp: Date;
  value: unknown;
}

export type CompositeTransform = (item: RawItem) => PointDraft[];

export const API_TAGS: Readonly<Record<string, string>> = {
  imported_from: "API",
};

// ============================================================================
// Value helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecords(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function readTimestamp(value: unknown): Date | null {
  return typeof value === "string" ? parseTimestamp(value) : null;
}

/**
 * Coerce a raw value to a float.
 *
 * Falsy values (absent, null, 0, "", false) become 0. Strings that are not
 * numbers are passed through unchanged; other shapes are kept as JSON text.
 */
export function coerceValue(value: unknown): PointValue {
  if (!value) {
    return 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === "boolean") {
    return 1;
  }
  if (typeof value === "string") {
    const parsed = Number(value.trim());
    return value.trim() !== "" && Number.isFinite(parsed) ? parsed : value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

export function toPoint(
  draft: PointDraft,
  tags: Readonly<Record<string, string>> = API_TAGS
): TimeSeriesPoint {
  return {
    measurement: draft.measurement,
    series: draft.series,
    timestamp: draft.timestamp,
    value: coerceValue(draft.value),
    tags: { ...tags },
  };
}

// ============================================================================
// Composite transforms
// ============================================================================

const HEART_ZONE_FIELDS = ["caloriesOut", "max", "min", "minutes"] as const;

/**
 * "Fat Burn" -> "hrz_fat_burn_<field>"
 */
export function heartZoneSeriesName(zoneName: string, field: string): string {
  return ["hrz", zoneName.replaceAll(" ", "_").toLowerCase(), field].join("_");
}

function transformHeartRateDay(item: RawItem): PointDraft[] {
  const timestamp = readTimestamp(item.dateTime);
  if (!timestamp) {
    return [];
  }
  const value: Record<string, unknown> = isRecord(item.value) ? item.value : {};

  const drafts: PointDraft[] = [
    {
      measurement: "activities",
      series: "restingHeartRate",
      timestamp,
      value: value.restingHeartRate,
    },
  ];

  for (const zone of asRecords(value.heartRateZones)) {
    const zoneName = typeof zone.name === "string" ? zone.name : "";
    for (const field of HEART_ZONE_FIELDS) {
      drafts.push({
        measurement: "activities",
        series: heartZoneSeriesName(zoneName, field),
        timestamp,
        value: zone[field],
      });
    }
  }

  return drafts;
}

/**
 * Body log entries are stamped with their creation time (logId is epoch
 * milliseconds), not with the logged date.
 */
function readLogCreationTime(item: RawItem): Date | null {
  const logId = Number(item.logId);
  if (item.logId === undefined || item.logId === null || !Number.isFinite(logId)) {
    return null;
  }
  const timestamp = new Date(logId);
  return Number.isNaN(timestamp.getTime()) ? null : timestamp;
}

function transformBodyWeightLog(item: RawItem): PointDraft[] {
  const timestamp = readLogCreationTime(item);
  if (!timestamp) {
    return [];
  }
  return (["bmi", "fat", "weight"] as const).map((field) => ({
    measurement: "body_log",
    series: `weight_${field}`,
    timestamp,
    value: item[field],
  }));
}

function transformBodyFatLog(item: RawItem): PointDraft[] {
  const timestamp = readLogCreationTime(item);
  if (!timestamp) {
    return [];
  }
  return [
    {
      measurement: "body_log",
      series: "fat_fat",
      timestamp,
      value: item.fat,
    },
  ];
}

const SLEEP_SCALAR_FIELDS = [
  "efficiency",
  "isMainSleep",
  "timeInBed",
  "minutesAfterWakeup",
  "minutesAsleep",
  "minutesAwake",
  "minutesToFallAsleep",
] as const;

const SLEEP_SUMMARY_FIELDS = ["count", "minutes", "thirtyDayAvgMinutes"] as const;

function sleepSegmentDrafts(
  measurement: "sleep_data" | "sleep_shortData",
  segments: unknown
): PointDraft[] {
  const drafts: PointDraft[] = [];
  for (const segment of asRecords(segments)) {
    const timestamp = readTimestamp(segment.dateTime);
    if (!timestamp || typeof segment.level !== "string") {
      continue;
    }
    drafts.push({
      measurement,
      series: `level_${segment.level}`,
      timestamp,
      value: segment.seconds,
    });
  }
  return drafts;
}

function transformSleepLog(item: RawItem): PointDraft[] {
  const timestamp = readTimestamp(item.startTime);
  if (!timestamp) {
    return [];
  }

  const durationMs = Number(item.duration ?? 0);
  const drafts: PointDraft[] = [
    {
      measurement: "sleep",
      series: "duration",
      timestamp,
      value: Number.isFinite(durationMs) ? durationMs / 1000 : item.duration,
    },
    ...SLEEP_SCALAR_FIELDS.map((field) => ({
      measurement: "sleep",
      series: field,
      timestamp,
      value: item[field],
    })),
  ];

  if (!isRecord(item.levels)) {
    return drafts;
  }
  const levels = item.levels;

  if (isRecord(levels.summary)) {
    for (const [stage, summary] of Object.entries(levels.summary)) {
      const stageSummary: Record<string, unknown> = isRecord(summary)
        ? summary
        : {};
      for (const field of SLEEP_SUMMARY_FIELDS) {
        drafts.push({
          measurement: "sleep_levels",
          series: `${stage.toLowerCase()}_${field}`,
          timestamp,
          value: stageSummary[field],
        });
      }
    }
  }

  drafts.push(...sleepSegmentDrafts("sleep_data", levels.data));
  drafts.push(...sleepSegmentDrafts("sleep_shortData", levels.shortData));

  return drafts;
}

export const COMPOSITE_TRANSFORMS: Readonly<
  Record<CompositeTransformName, CompositeTransform>
> = {
  heart: transformHeartRateDay,
  "body-log-weight": transformBodyWeightLog,
  "body-log-fat": transformBodyFatLog,
  sleep: transformSleepLog,
};

// ============================================================================
// Entry points
// ============================================================================

/**
 * Transform one raw item of `series` into points.
 */
export function transformItem(
  family: MeasurementFamily,
  series: SeriesSpec,
  item: RawItem
): TimeSeriesPoint[] {
  if (series.kind === "composite") {
    return COMPOSITE_TRANSFORMS[series.transform](item).map((draft) =>
      toPoint(draft)
    );
  }

  const timestamp = readTimestamp(item.dateTime);
  if (!timestamp) {
    return [];
  }
  return [
    toPoint({
      measurement: family.name,
      series: series.name,
      timestamp,
      value: item.value,
    }),
  ];
}

export function transformItems(
  family: MeasurementFamily,
  series: SeriesSpec,
  items: readonly RawItem[]
): TimeSeriesPoint[] {
  return items.flatMap((item) => transformItem(family, series, item));
}

/**
 * Source responses wrap the items in a single named array
 * (`{"activities-steps": [...]}`, `{"sleep": [...]}`); take the first one.
 * Null and non-object entries are dropped.
 */
export function extractItems(payload: RawPayload): RawItem[] | null {
  for (const value of Object.values(payload)) {
    if (Array.isArray(value)) {
      return asRecords(value);
    }
  }
  return null;
}
