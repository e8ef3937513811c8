/**
 * Export Importer - Loads a Fitbit account data export into the store
 *
 * The export holds one file per measurement and period; every file of a
 * measurement is merged, deduplicated by timestamp and written in large
 * batches. Reruns only write what is newer than the last stored record.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";

import { parse } from "csv-parse/sync";

import { ConfigurationError } from "../../errors.js";
import { exportLogger } from "../../logger.js";
import { EXPORT_MEASUREMENTS, parseExportTimestamp } from "./measurements.js";

import type { ExportMeasurement } from "./measurements.js";
import type { SeriesStore } from "../sync/store.js";
import type { SyncWriter } from "../sync/writer.js";
import type { RawItem, TimeSeriesPoint } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export const EXPORT_BATCH_SIZE = 5000;
export const EXPORT_TAGS: Readonly<Record<string, string>> = {
  imported_from: "data_dump",
};

export interface ExportRecord {
  timestamp: Date;
  fields: Record<string, number>;
}

export interface ImportResult {
  measurement: string;
  files: number;
  records: number;
  duplicates: number;
  /** Records at or after the last stored timestamp */
  pending: number;
  written: number;
  skipped: boolean;
}

export interface ImportProgress {
  measurement: string;
  current: number;
  total: number;
}

type ProgressCallback = (progress: ImportProgress) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Record conversion
// ============================================================================

/**
 * Read the configured fields of one raw record. A missing field is
 * converted from 0; a value that is not a number drops the field.
 */
export function toExportRecord(
  measurement: ExportMeasurement,
  raw: RawItem
): ExportRecord | null {
  const item = measurement.extract ? measurement.extract(raw) : raw;
  if (!item || typeof item.dateTime !== "string") {
    return null;
  }
  const timestamp = parseExportTimestamp(item.dateTime);
  if (!timestamp) {
    return null;
  }

  // Composite records nest their fields under "value"
  const source = isRecord(item.value) ? item.value : item;
  const fields: Record<string, number> = {};
  for (const [name, convert] of measurement.fields) {
    const rawValue = source[name] ?? 0;
    const converted = convert(Number(rawValue));
    if (Number.isFinite(converted)) {
      fields[name] = converted;
    }
  }

  return { timestamp, fields };
}

/**
 * Keep the first record of every timestamp
 */
export function dedupeRecords(records: readonly ExportRecord[]): {
  unique: ExportRecord[];
  duplicates: number;
} {
  const seen = new Set<number>();
  const unique: ExportRecord[] = [];
  for (const record of records) {
    const key = record.timestamp.getTime();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }
  return { unique, duplicates: records.length - unique.length };
}

export function toPoints(
  measurement: string,
  records: readonly ExportRecord[]
): TimeSeriesPoint[] {
  return records.flatMap((record) =>
    Object.entries(record.fields).map(([series, value]) => ({
      measurement,
      series,
      timestamp: record.timestamp,
      value,
      tags: { ...EXPORT_TAGS },
    }))
  );
}

/**
 * Rows of an oxygen variation CSV: "timestamp,value". The header row is
 * the one naming the infrared ratio.
 */
export function parseOxygenCsv(content: string): RawItem[] {
  const rows: string[][] = parse(content, {
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });
  const items: RawItem[] = [];
  for (const row of rows) {
    const [dateTime, value] = row;
    if (
      dateTime === undefined ||
      value === undefined ||
      row.some((cell) => cell.includes("Infrared"))
    ) {
      continue;
    }
    items.push({ dateTime, value });
  }
  return items;
}

// ============================================================================
// Importer
// ============================================================================

export interface ExportImporterOptions {
  store: SeriesStore;
  writer: SyncWriter;
  measurements?: readonly ExportMeasurement[];
}

export class ExportImporter {
  private onProgress?: ProgressCallback;
  private readonly store: SeriesStore;
  private readonly writer: SyncWriter;
  private readonly measurements: readonly ExportMeasurement[];

  constructor(options: ExportImporterOptions) {
    this.store = options.store;
    this.writer = options.writer;
    this.measurements = options.measurements ?? EXPORT_MEASUREMENTS;
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Import every known measurement from an export directory. The directory
   * must contain `user-site-export/`.
   */
  async importAll(dumpDir: string): Promise<ImportResult[]> {
    const exportDir = join(dumpDir, "user-site-export");
    const isDirectory = await stat(exportDir).then(
      (info) => info.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw new ConfigurationError(
        `Export directory does not contain user-site-export: ${dumpDir}`,
        [`${exportDir}: not a directory`]
      );
    }

    await this.store.ensureDatabase();
    const entries = (await readdir(exportDir)).sort();

    const ordered = [...this.measurements].sort((a, b) =>
      a.name.localeCompare(b.name)
    );
    const results: ImportResult[] = [];
    for (const [index, measurement] of ordered.entries()) {
      this.onProgress?.({
        measurement: measurement.name,
        current: index + 1,
        total: ordered.length,
      });
      const files = entries
        .filter((entry) => isMeasurementFile(measurement, entry))
        .map((entry) => join(exportDir, entry));
      results.push(await this.importMeasurement(measurement, files));
    }

    exportLogger.info(
      {
        measurements: results.length,
        written: results.reduce((sum, result) => sum + result.written, 0),
      },
      "Export import completed"
    );
    return results;
  }

  async importMeasurement(
    measurement: ExportMeasurement,
    files: readonly string[]
  ): Promise<ImportResult> {
    const log = exportLogger.child({ measurement: measurement.name });
    const result: ImportResult = {
      measurement: measurement.name,
      files: files.length,
      records: 0,
      duplicates: 0,
      pending: 0,
      written: 0,
      skipped: false,
    };

    const raw: RawItem[] = [];
    for (const file of files) {
      raw.push(...(await readExportFile(measurement, file)));
    }

    const records = raw
      .map((item) => toExportRecord(measurement, item))
      .filter((record): record is ExportRecord => record !== null);
    const { unique, duplicates } = dedupeRecords(records);
    result.records = unique.length;
    result.duplicates = duplicates;

    if (duplicates > 0) {
      log.warn({ duplicates }, "Dropped records with duplicated timestamps");
    }

    const referenceField = measurement.fields[0]?.[0];
    if (referenceField === undefined || unique.length === 0) {
      log.info({ files: files.length }, "Nothing to import");
      return { ...result, skipped: true };
    }

    const lastStored = await this.store.selectBoundary(
      measurement.name,
      referenceField,
      "last",
      "s"
    );
    const pending = lastStored
      ? unique.filter(
          (record) => record.timestamp.getTime() >= lastStored.getTime()
        )
      : unique;
    result.pending = pending.length;

    log.info(
      {
        files: files.length,
        records: unique.length,
        pending: pending.length,
        lastStored: lastStored?.toISOString() ?? null,
      },
      "Read export files"
    );

    if (pending.length === 0) {
      log.info("All records were written by an earlier import");
      return { ...result, skipped: true };
    }

    const write = await this.writer.write(
      toPoints(measurement.name, pending),
      {
        precision: "s",
        batchSize: EXPORT_BATCH_SIZE,
        countCheck: { measurement: measurement.name, series: referenceField },
      }
    );

    if (write.skipped) {
      log.info("Stored count matches export, skipping");
    } else {
      log.info(
        { written: write.written, inserted: write.inserted },
        "Measurement imported"
      );
    }

    return { ...result, written: write.written, skipped: write.skipped };
  }
}

function isMeasurementFile(
  measurement: ExportMeasurement,
  entry: string
): boolean {
  return (
    entry.startsWith(`${measurement.name}-`) &&
    entry.endsWith(`.${measurement.format}`)
  );
}

async function readExportFile(
  measurement: ExportMeasurement,
  file: string
): Promise<RawItem[]> {
  const content = await readFile(file, "utf8");
  if (measurement.format === "csv") {
    return parseOxygenCsv(content);
  }

  const parsed: unknown = JSON.parse(content);
  if (Array.isArray(parsed)) {
    return parsed.filter(isRecord);
  }
  return isRecord(parsed) ? [parsed] : [];
}
