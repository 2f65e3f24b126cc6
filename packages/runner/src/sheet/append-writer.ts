import { logger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import type { TableLayout } from "../types/config.js";
import type { ResultRecord } from "../types/report.js";
import type { CellWrite, TableStore } from "./table-store.js";

export interface AppendOptions {
  /**
   * `columns`: headers down column A, one record per column.
   * `rows`: headers along row 1, one record per row.
   */
  layout: TableLayout;
  log?: Logger;
}

/** Header names in store order; index 0 sits at row/column 1. */
export function readHeaders(store: TableStore, layout: TableLayout): Promise<string[]> {
  return layout === "columns" ? store.readColumn(1) : store.readRow(1);
}

/**
 * First empty record slot (a column for `columns`, a row for `rows`) after
 * the header line. Slot 1 holds the headers, so the answer is at least 2.
 */
export async function findNextFreeSlot(store: TableStore, layout: TableLayout): Promise<number> {
  const firstLine = layout === "columns" ? await store.readRow(1) : await store.readColumn(1);
  let slot = 2;
  while (slot <= firstLine.length && (firstLine[slot - 1] ?? "") !== "") slot++;
  return slot;
}

/**
 * Appends `record` into the next free slot. One cell per header the record
 * knows; record fields missing from the header line are skipped with a
 * warning. Store failures are logged and reported as false, never thrown.
 */
export async function appendRecord(
  store: TableStore,
  record: ResultRecord,
  { layout, log = logger.createChild("append-writer") }: AppendOptions,
): Promise<boolean> {
  try {
    const headers = await readHeaders(store, layout);
    const slot = await findNextFreeSlot(store, layout);

    const size = await store.size();
    const needed = layout === "columns" ? { rows: size.rows, cols: slot } : { rows: slot, cols: size.cols };
    if (needed.rows > size.rows || needed.cols > size.cols) {
      await store.resize({ rows: Math.max(size.rows, needed.rows), cols: Math.max(size.cols, needed.cols) });
      log.info({ rows: Math.max(size.rows, needed.rows), cols: Math.max(size.cols, needed.cols) }, "resized table");
    }

    const cells: CellWrite[] = [];
    headers.forEach((header, i) => {
      if (!Object.hasOwn(record, header)) return;
      const at = i + 1;
      cells.push(
        layout === "columns"
          ? { row: at, col: slot, value: record[header] }
          : { row: slot, col: at, value: record[header] },
      );
    });

    const known = new Set(headers);
    const missing = Object.keys(record).filter((f) => !known.has(f));
    if (missing.length) log.warn({ fields: missing }, "fields not present in table headers, skipped");

    if (cells.length) await store.updateCells(cells);
    log.info({ layout, slot, cells: cells.length }, "appended record");
    return true;
  } catch (err) {
    log.error({ err }, "could not append record");
    return false;
  }
}

/**
 * One more than the largest integer stored under the run-number header,
 * or 1 when there is none (or the header is missing).
 */
export async function nextRunNumber(
  store: TableStore,
  runField: string,
  layout: TableLayout,
): Promise<number> {
  const headers = await readHeaders(store, layout);
  const index = headers.indexOf(runField);
  if (index === -1) return 1;

  const line = layout === "columns" ? await store.readRow(index + 1) : await store.readColumn(index + 1);
  const numbers = line
    .slice(1)
    .map((v) => v.trim())
    .filter((v) => /^\d+$/.test(v))
    .map(Number);
  return numbers.length ? Math.max(...numbers) + 1 : 1;
}
