// ============================================================================
// Time-series domain
// ============================================================================

/**
 * Timestamp precision used when writing and reading back a family's points
 */
export type TimePrecision = "s" | "h";

/**
 * Numeric when the source value coerces to a number, the original text
 * otherwise
 */
export type PointValue = number | string;

export interface TimeSeriesPoint {
  measurement: string;
  series: string;
  timestamp: Date;
  value: PointValue;
  tags: Record<string, string>;
}

/**
 * Inclusive range of UTC days requested from the source in one call
 */
export interface SyncInterval {
  start: Date;
  end: Date;
}

/** One object of the array returned by the source; shape depends on family */
export type RawItem = Record<string, unknown>;

/** Parsed JSON body of a source response */
export type RawPayload = Record<string, unknown>;

// ============================================================================
// Source account
// ============================================================================

export interface UserProfile {
  memberSince: Date;
}

export interface Credentials {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
  /** Epoch seconds; null when unknown */
  expiresAt: number | null;
}

/**
 * New token material handed out by the source on refresh
 */
export interface TokenRotation {
  accessToken: string;
  refreshToken: string;
  /** Seconds until the new access token expires */
  expiresIn: number;
}

// ============================================================================
// Fitbit Web API payloads
// https://dev.fitbit.com/build/reference/web-api/
// ============================================================================

export interface HeartRateZone {
  name: string;
  min?: number;
  max?: number;
  minutes?: number;
  caloriesOut?: number;
}

/** activities/heart */
export interface HeartRateDay {
  dateTime: string;
  value: {
    restingHeartRate?: number;
    heartRateZones?: HeartRateZone[];
    customHeartRateZones?: HeartRateZone[];
  };
}

/** body/log/weight */
export interface BodyWeightLogEntry {
  logId: number;
  date: string;
  time: string;
  weight?: number;
  bmi?: number;
  fat?: number;
  source?: string;
}

export interface SleepStageSegment {
  dateTime: string;
  level: string;
  seconds: number;
}

export interface SleepStageSummary {
  count?: number;
  minutes?: number;
  thirtyDayAvgMinutes?: number;
}

/** sleep (API 1.2) */
export interface SleepLog {
  logId: number;
  dateOfSleep: string;
  startTime: string;
  endTime?: string;
  duration?: number;
  efficiency?: number;
  isMainSleep?: boolean;
  timeInBed?: number;
  minutesAfterWakeup?: number;
  minutesAsleep?: number;
  minutesAwake?: number;
  minutesToFallAsleep?: number;
  type?: "stages" | "classic";
  levels?: {
    summary?: Record<string, SleepStageSummary>;
    data?: SleepStageSegment[];
    shortData?: SleepStageSegment[];
  };
}
