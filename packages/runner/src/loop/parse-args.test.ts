import { describe, it, expect } from "vitest";
import { parseArgs } from "./parse-args.js";
import { env } from "../lib/env.js";

describe("parseArgs", () => {
  it("reads the batch flags", () => {
    expect(parseArgs(["node", "hyperauto", "--config", "batch.json", "--dry-run"])).toEqual({
      configPath: "batch.json",
      dryRun: true,
      reportFile: undefined,
      strategy: undefined,
      help: false,
    });
  });

  it("reads the report flags", () => {
    const options = parseArgs(["node", "hyperauto", "--report=show.txt", "--strategy=Foo"]);
    expect(options.reportFile).toBe("show.txt");
    expect(options.strategy).toBe("Foo");
    expect(options.dryRun).toBe(false);
  });

  it("falls back to HYPERAUTO_CONFIG", () => {
    expect(parseArgs(["node", "hyperauto"]).configPath).toBe(env.HYPERAUTO_CONFIG);
  });
});
