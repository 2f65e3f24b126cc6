/** One row of the runs sheet, after validation. Optional flags are absent when blank or OFF. */
export interface RunDefinition {
  /** Spreadsheet row the definition came from (header is row 1). */
  row: number;
  strategy: string;
  config: string;
  epochs: string;
  timerange: string;
  pairs?: string;
  leverage?: string;
  riskPerTrade?: string;
  spaces?: string;
  lossFunction?: string;
  jobs?: string;
  minTrades?: string;
  randomState?: string;
}

export interface HyperoptOutcome {
  ok: boolean;
  /** Captured from the optimizer output, else the supplied one. */
  seed: string | null;
  exitCode: number | null;
}
