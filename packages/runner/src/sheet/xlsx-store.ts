import fs from "node:fs";
import XLSX from "xlsx";
import writeFileAtomic from "write-file-atomic";
import type { CellWrite, GridSize, TableStore } from "./table-store.js";

const NUMERIC = /^-?\d+(?:\.\d+)?$/;

function readWorkbook(filePath: string): XLSX.WorkBook {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Workbook not found: ${filePath}`);
  }
  return XLSX.read(fs.readFileSync(filePath), { type: "buffer" });
}

function getSheet(workbook: XLSX.WorkBook, name: string, filePath: string): XLSX.WorkSheet {
  const sheet = workbook.Sheets[name];
  if (!sheet) {
    throw new Error(`Sheet "${name}" not found in ${filePath} (has: ${workbook.SheetNames.join(", ")})`);
  }
  return sheet;
}

function cellText(sheet: XLSX.WorkSheet, r: number, c: number): string {
  const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
  if (!cell || cell.v === undefined || cell.v === null) return "";
  return String(cell.v).trim();
}

function trimTrailingEmpty(values: string[]): string[] {
  let end = values.length;
  while (end > 0 && values[end - 1] === "") end--;
  return values.slice(0, end);
}

/**
 * TableStore over one sheet of a local .xlsx workbook. The workbook is read
 * once; every mutation is written back atomically so a crash leaves either
 * the old or the new file.
 */
export class XlsxTableStore implements TableStore {
  private constructor(
    private readonly filePath: string,
    private readonly workbook: XLSX.WorkBook,
    private readonly sheet: XLSX.WorkSheet,
  ) {}

  static open(filePath: string, sheetName: string): XlsxTableStore {
    const workbook = readWorkbook(filePath);
    return new XlsxTableStore(filePath, workbook, getSheet(workbook, sheetName, filePath));
  }

  private range(): XLSX.Range {
    return XLSX.utils.decode_range(this.sheet["!ref"] ?? "A1:A1");
  }

  async size(): Promise<GridSize> {
    if (!this.sheet["!ref"]) return { rows: 0, cols: 0 };
    const { e } = this.range();
    return { rows: e.r + 1, cols: e.c + 1 };
  }

  async readRow(row: number): Promise<string[]> {
    const { e } = this.range();
    const values: string[] = [];
    for (let c = 0; c <= e.c; c++) values.push(cellText(this.sheet, row - 1, c));
    return trimTrailingEmpty(values);
  }

  async readColumn(col: number): Promise<string[]> {
    const { e } = this.range();
    const values: string[] = [];
    for (let r = 0; r <= e.r; r++) values.push(cellText(this.sheet, r, col - 1));
    return trimTrailingEmpty(values);
  }

  async resize({ rows, cols }: GridSize): Promise<void> {
    this.sheet["!ref"] = XLSX.utils.encode_range({
      s: { r: 0, c: 0 },
      e: { r: Math.max(rows, 1) - 1, c: Math.max(cols, 1) - 1 },
    });
    await this.flush();
  }

  /** Numeric strings are stored as numbers, like a user typing them in. */
  async updateCells(cells: readonly CellWrite[]): Promise<void> {
    const range = this.range();
    for (const { row, col, value } of cells) {
      const address = XLSX.utils.encode_cell({ r: row - 1, c: col - 1 });
      this.sheet[address] = NUMERIC.test(value) ? { t: "n", v: Number(value) } : { t: "s", v: value };
      range.e.r = Math.max(range.e.r, row - 1);
      range.e.c = Math.max(range.e.c, col - 1);
    }
    this.sheet["!ref"] = XLSX.utils.encode_range(range);
    await this.flush();
  }

  private async flush(): Promise<void> {
    const buffer: Buffer = XLSX.write(this.workbook, { type: "buffer", bookType: "xlsx" });
    await writeFileAtomic(this.filePath, buffer);
  }
}

/**
 * Rows of a sheet as objects keyed by the header row, every cell as trimmed
 * text ("" when blank).
 */
export function readSheetRecords(filePath: string, sheetName: string): Record<string, string>[] {
  const workbook = readWorkbook(filePath);
  const sheet = getSheet(workbook, sheetName, filePath);
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "", raw: true });
  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([k, v]) => [k.trim(), String(v ?? "").trim()])),
  );
}
