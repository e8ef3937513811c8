/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { formatDay } from "../../utils/dates.js";

import type { ImportResult } from "../../services/export/importer.js";
import type { PassSummary, SeriesPlan } from "../../services/sync/loop.js";

export interface SeriesStatusRow {
  measurement: string;
  series: string;
  first: Date | null;
  last: Date | null;
  count: number;
}

function formatTime(value: Date | null): string {
  return value ? value.toISOString().replace(".000Z", "Z") : chalk.gray("-");
}

/**
 * Display the per-series outcome of a sync pass
 */
export function displayPassSummary(summary: PassSummary): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Measurement"),
      chalk.cyan("Series"),
      chalk.cyan("Intervals"),
      chalk.cyan("Items"),
      chalk.cyan("Points"),
      chalk.cyan("Inserted"),
      chalk.cyan("Updated"),
    ],
  });

  for (const result of summary.series) {
    table.push([
      result.measurement,
      result.gapDetected ? chalk.yellow(result.series) : result.series,
      String(result.intervals),
      String(result.items),
      String(result.points),
      result.write.skipped ? chalk.gray("skipped") : String(result.write.inserted),
      String(result.write.updated),
    ]);
  }

  console.log(table.toString());

  const seconds =
    (summary.finishedAt.getTime() - summary.startedAt.getTime()) / 1000;
  console.log(
    `\n${chalk.bold("Totals:")} ${String(summary.totals.points)} points, ` +
      `${chalk.green(String(summary.totals.inserted))} inserted, ` +
      `${String(summary.totals.updated)} updated in ${seconds.toFixed(1)}s`
  );
}

/**
 * Display the intervals each series would request
 */
export function displayPlan(plans: SeriesPlan[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Measurement"),
      chalk.cyan("Series"),
      chalk.cyan("Stored"),
      chalk.cyan("Requests"),
      chalk.cyan("Range"),
    ],
  });

  for (const { family, series, first, last, plan } of plans) {
    const firstInterval = plan.intervals[0];
    const lastInterval = plan.intervals[plan.intervals.length - 1];
    const range =
      firstInterval && lastInterval
        ? `${formatDay(firstInterval.start)} .. ${formatDay(lastInterval.end)}`
        : chalk.gray("-");

    table.push([
      family.name,
      series.name,
      first && last
        ? `${formatDay(first)} .. ${formatDay(last)}`
        : chalk.gray("empty"),
      plan.gapDetected
        ? chalk.yellow(String(plan.intervals.length))
        : chalk.gray("keep-alive"),
      range,
    ]);
  }

  console.log(table.toString());
}

/**
 * Display stored range and value count per key series
 */
export function displayStatus(rows: SeriesStatusRow[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Measurement"),
      chalk.cyan("Series"),
      chalk.cyan("First"),
      chalk.cyan("Last"),
      chalk.cyan("Values"),
    ],
  });

  for (const row of rows) {
    table.push([
      row.measurement,
      row.series,
      formatTime(row.first),
      formatTime(row.last),
      row.count > 0 ? chalk.green(String(row.count)) : chalk.gray("0"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display export import results
 */
export function displayImportResults(results: ImportResult[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Measurement"),
      chalk.cyan("Files"),
      chalk.cyan("Records"),
      chalk.cyan("Duplicates"),
      chalk.cyan("Written"),
    ],
  });

  for (const result of results) {
    table.push([
      result.measurement,
      String(result.files),
      String(result.records),
      result.duplicates > 0
        ? chalk.yellow(String(result.duplicates))
        : String(result.duplicates),
      result.skipped ? chalk.gray("skipped") : chalk.green(String(result.written)),
    ]);
  }

  console.log(table.toString());
}
