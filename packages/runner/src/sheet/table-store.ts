/** 1-based cell coordinates, as spreadsheets count them. */
export interface CellWrite {
  row: number;
  col: number;
  value: string;
}

export interface GridSize {
  rows: number;
  cols: number;
}

/**
 * The slice of a spreadsheet the writer needs. Implementations may be remote;
 * every call can reject.
 */
export interface TableStore {
  size(): Promise<GridSize>;
  /** Cell values of one row, index 0 = column 1; trailing empties may be omitted. */
  readRow(row: number): Promise<string[]>;
  /** Cell values of one column, index 0 = row 1; trailing empties may be omitted. */
  readColumn(col: number): Promise<string[]>;
  resize(size: GridSize): Promise<void>;
  updateCells(cells: readonly CellWrite[]): Promise<void>;
}
