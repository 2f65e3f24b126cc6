import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

import { execa } from "execa";
import { runHyperoptShow } from "./run-hyperopt-show.js";

describe("runHyperoptShow", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("returns stdout on success", async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: 0, stdout: "SUMMARY METRICS", stderr: "" } as any);
    expect(await runHyperoptShow(["run", "hyperopt-show"])).toBe("SUMMARY METRICS");
    expect(execa).toHaveBeenCalledWith(
      "docker",
      ["run", "hyperopt-show"],
      expect.objectContaining({ stdin: "ignore", reject: false }),
    );
  });

  it("returns null on a non-zero exit", async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: 1, stdout: "", stderr: "no such file" } as any);
    expect(await runHyperoptShow([])).toBeNull();
  });

  it("returns null when execa throws", async () => {
    vi.mocked(execa).mockRejectedValue(new Error("spawn docker ENOENT"));
    expect(await runHyperoptShow([])).toBeNull();
  });
});
