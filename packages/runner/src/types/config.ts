import { z } from "zod";
import type { RunContextKey } from "./report.js";

// --- Zod Schemas ---

export const RUN_CONTEXT_KEYS = [
  "strategy",
  "config",
  "epochs",
  "timerange",
  "pairs",
  "leverage",
  "riskPerTrade",
  "lossFunction",
  "seed",
  "runNumber",
  "timestamp",
] as const satisfies readonly RunContextKey[];

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const ContextFieldSchema = z.object({
  name: z.string().min(1),
  from: z.enum(RUN_CONTEXT_KEYS),
});

export const StrategyFieldSchema = z.union([
  z.string().min(1).transform((name) => ({
    name,
    keys: [name.toLowerCase()],
    prefer: "buy" as const,
  })),
  z.object({
    name: z.string().min(1),
    keys: z.array(z.string().min(1)).min(1),
    prefer: z.enum(["buy", "sell"]).default("buy"),
  }),
]);

export const ResultSchemaSchema = z.object({
  context: z.array(ContextFieldSchema).default([]),
  strategy: z.array(StrategyFieldSchema).default([]),
  metrics: z.array(z.string().min(1)).default([]),
});

/**
 * Lists what makes a set of field lists unusable as a record schema:
 * all three lists empty, or a name declared twice (within or across lists).
 */
export function findSchemaProblems(lists: {
  context: readonly { name: string }[];
  strategy: readonly { name: string }[];
  metrics: readonly string[];
}): string[] {
  const problems: string[] = [];
  const names = [
    ...lists.context.map((f) => f.name),
    ...lists.strategy.map((f) => f.name),
    ...lists.metrics,
  ];
  if (!names.length) {
    problems.push("At least one of context, strategy or metrics must list a field");
  }
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) problems.push(`Field "${name}" is declared more than once`);
    seen.add(name);
  }
  return problems;
}

export const LabelRuleSchema = z.object({
  contains: z.string().min(1),
  key: z.string().min(1),
  transform: z.enum(["none", "before-slash", "strip-percent"]).default("none"),
});

export const MetricsConfigSchema = z.object({
  passthrough: z.boolean().default(false),
  precedence: z
    .array(z.enum(["summary-metrics", "backtest-total"]))
    .default(["summary-metrics", "backtest-total"]),
  labels: z.array(LabelRuleSchema).default([]),
});

export const MarkersSchema = z.object({
  buyParams: z.string().min(1).optional(),
  sellParams: z.string().min(1).optional(),
  roi: z.string().min(1).optional(),
  stoploss: z.string().min(1).optional(),
  trailingStop: z.string().min(1).optional(),
  maxOpenTrades: z.string().min(1).optional(),
  summaryMetrics: z.string().min(1).optional(),
  backtestReport: z.string().min(1).optional(),
});

export const DockerConfigSchema = z.object({
  image: z.string().min(1).default("freqtradeorg/freqtrade:stable"),
  hostUserDataPath: z.string().min(1),
  containerUserDataPath: z.string().min(1).default("/freqtrade/user_data"),
  resultsDir: z.string().min(1).default("hyperopt_results"),
  showOutputFile: z.string().min(1).default("hyperopt_show_output.txt"),
  defaultConfigFilename: z.string().min(1).default("config.json"),
  defaultLossFunction: z.string().min(1).default("SharpeHyperOptLoss"),
  defaultJobWorkers: z.number().int().min(-1).default(-1),
});

export const WorkbookConfigSchema = z.object({
  path: z.string().min(1),
  resultsSheet: z.string().min(1).default("Results"),
  runsSheet: z.string().min(1).default("Runs"),
  layout: z.enum(["columns", "rows"]).default("columns"),
});

export const HyperautoConfigSchema = z
  .object({
    docker: DockerConfigSchema,
    workbook: WorkbookConfigSchema,
    schema: ResultSchemaSchema,
    metrics: MetricsConfigSchema.default({}),
    markers: MarkersSchema.default({}),
    resultSettleMs: z.number().int().min(0).default(5000),
    logLevels: z.record(z.string(), LogLevelSchema).default({}),
  })
  .superRefine((data, ctx) => {
    for (const message of findSchemaProblems(data.schema)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path: ["schema"] });
    }
  });

// --- TypeScript types (inferred from Zod) ---

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ContextField = z.infer<typeof ContextFieldSchema>;
export type StrategyField = z.output<typeof StrategyFieldSchema>;
export type ResultSchemaInput = z.input<typeof ResultSchemaSchema>;
export type LabelRule = z.infer<typeof LabelRuleSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type MarkerOverrides = z.infer<typeof MarkersSchema>;
export type DockerConfig = z.infer<typeof DockerConfigSchema>;
export type WorkbookConfig = z.infer<typeof WorkbookConfigSchema>;
export type TableLayout = WorkbookConfig["layout"];
export type HyperautoConfig = z.infer<typeof HyperautoConfigSchema>;
