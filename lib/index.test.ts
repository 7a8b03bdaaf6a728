import { describe, it, expect } from "vitest";
import * as api from "./index";
import { project, computeDerivedStats, parseStrategyParameters } from "./index";

describe("public API", () => {
  it("projects parsed parameters", () => {
    const records = project(
      parseStrategyParameters({ numberOfCycles: 1, periodsPerCycle: 2 })
    );
    expect(records.map((r) => r.endingBalance)).toEqual([1040, 1080]);
    expect(computeDerivedStats(40, 2, 10).periodReturnR).toBe(2);
  });

  it("keeps the store behind its own entry point", () => {
    expect("createProjectorStore" in api).toBe(false);
  });
});
