/**
 * Measurement families synced from the Fitbit Web API.
 *
 * Simple series are fetched one request per series and map one
 * `{dateTime, value}` item to one point. Composite series return a combined
 * payload; their transform fans each item out into many points, and their
 * key series stands in for the whole payload when looking for gaps.
 */

import type { ApiVersion } from "../../source/client.js";
import type { TimePrecision } from "../../types/index.js";

export type CompositeTransformName =
  | "heart"
  | "body-log-weight"
  | "body-log-fat"
  | "sleep";

export type SeriesSpec =
  | { kind: "simple"; name: string }
  | {
      kind: "composite";
      name: string;
      keySeries: string;
      transform: CompositeTransformName;
    };

export interface MeasurementFamily {
  /** Measurement name in the store, e.g. "activities_tracker" */
  name: string;
  /** Path prefix of the source resource, e.g. "activities/tracker" */
  resourcePrefix: string;
  precision: TimePrecision;
  apiVersion: ApiVersion;
  series: readonly SeriesSpec[];
}

function simple(...names: string[]): SeriesSpec[] {
  return names.map((name): SeriesSpec => ({ kind: "simple", name }));
}

const ACTIVITY_SERIES = [
  "activityCalories",
  "calories",
  "distance",
  "elevation",
  "floors",
  "minutesFairlyActive",
  "minutesLightlyActive",
  "minutesSedentary",
  "minutesVeryActive",
  "steps",
] as const;

export const MEASUREMENT_FAMILIES: readonly MeasurementFamily[] = [
  {
    name: "activities",
    resourcePrefix: "activities",
    precision: "h",
    apiVersion: "1",
    series: [
      ...simple("activityCalories", "calories", "caloriesBMR", "distance"),
      ...simple("elevation", "floors"),
      {
        kind: "composite",
        name: "heart",
        keySeries: "restingHeartRate",
        transform: "heart",
      },
      ...simple(
        "minutesFairlyActive",
        "minutesLightlyActive",
        "minutesSedentary",
        "minutesVeryActive",
        "steps"
      ),
    ],
  },
  {
    name: "activities_tracker",
    resourcePrefix: "activities/tracker",
    precision: "h",
    apiVersion: "1",
    series: simple(...ACTIVITY_SERIES),
  },
  {
    name: "body",
    resourcePrefix: "body",
    precision: "h",
    apiVersion: "1",
    series: simple("bmi", "fat", "weight"),
  },
  {
    name: "body_log",
    resourcePrefix: "body/log",
    precision: "h",
    apiVersion: "1",
    series: [
      {
        kind: "composite",
        name: "fat",
        keySeries: "fat_fat",
        transform: "body-log-fat",
      },
      {
        kind: "composite",
        name: "weight",
        keySeries: "weight_weight",
        transform: "body-log-weight",
      },
    ],
  },
  {
    name: "foods_log",
    resourcePrefix: "foods/log",
    precision: "h",
    apiVersion: "1",
    series: simple("caloriesIn", "water"),
  },
  {
    name: "sleep",
    resourcePrefix: "sleep",
    precision: "s",
    apiVersion: "1.2",
    series: [
      {
        kind: "composite",
        name: "sleep",
        keySeries: "efficiency",
        transform: "sleep",
      },
    ],
  },
];

/**
 * Source resource path of a series; sleep is its own top-level resource.
 */
export function resourcePath(
  family: MeasurementFamily,
  series: SeriesSpec
): string {
  if (family.resourcePrefix === series.name) {
    return family.resourcePrefix;
  }
  return `${family.resourcePrefix}/${series.name}`;
}

/**
 * Series queried to find what the store already holds for `series`
 */
export function keySeriesOf(series: SeriesSpec): string {
  return series.kind === "composite" ? series.keySeries : series.name;
}

export function findFamily(name: string): MeasurementFamily | undefined {
  return MEASUREMENT_FAMILIES.find((family) => family.name === name);
}
