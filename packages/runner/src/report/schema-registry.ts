import { parseOrThrow } from "@hyperauto/kit";
import { ResultSchemaSchema, findSchemaProblems } from "../types/config.js";
import type { ContextField, ResultSchemaInput, StrategyField } from "../types/config.js";

/** Immutable, validated field lists. `fields` is the output column order. */
export interface ResultSchema {
  readonly context: readonly ContextField[];
  readonly strategy: readonly StrategyField[];
  readonly metrics: readonly string[];
  readonly fields: readonly string[];
}

/**
 * Builds the schema for a run. Throws when all three lists are empty or a
 * field name appears twice, so a bad schema never reaches the normalizer.
 */
export function createResultSchema(input: ResultSchemaInput): ResultSchema {
  const lists = parseOrThrow(ResultSchemaSchema, input, "result schema");
  const problems = findSchemaProblems(lists);
  if (problems.length) {
    throw new Error(`Invalid result schema:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
  }

  return Object.freeze({
    context: Object.freeze(lists.context.map((f) => Object.freeze({ ...f }))),
    strategy: Object.freeze(
      lists.strategy.map((f) => Object.freeze({ ...f, keys: [...f.keys] })),
    ),
    metrics: Object.freeze([...lists.metrics]),
    fields: Object.freeze([
      ...lists.context.map((f) => f.name),
      ...lists.strategy.map((f) => f.name),
      ...lists.metrics,
    ]),
  });
}
