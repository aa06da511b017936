import { describe, expect, it } from "vitest";
import { HeuristicFormExtractor } from "./heuristic-form-extractor.js";

describe("HeuristicFormExtractor", () => {
  it("reads a NOAEL line with shared study details", async () => {
    const extractor = new HeuristicFormExtractor();

    const payloads = await extractor.extract(
      ["NOAEL: 50 mg/kg bw/day", "Species: Rat", "Duration: 90 days", "Source: ECHA", "Title: 90-day oral study"].join(
        "\n",
      ),
    );

    expect(payloads).toEqual({
      NOAEL: {
        value: 50,
        unit: "mg/kg bw/day",
        experiment_target: "Rat",
        study_duration: "90 days",
        source: "ECHA",
        reference_title: "90-day oral study",
      },
    });
  });

  it("always reports dermal absorption in percent", async () => {
    const payloads = await new HeuristicFormExtractor().extract("Dermal absorption: 12.5 %\nSource: SCCS");

    expect(payloads).toEqual({ DAP: { value: 12.5, unit: "%", source: "SCCS" } });
  });

  it("falls back to a unit line for NOAEL values without one", async () => {
    const payloads = await new HeuristicFormExtractor().extract("noael_value = 300\nUnit: mg/kg");

    expect(payloads.NOAEL).toEqual({ value: 300, unit: "mg/kg" });
  });

  it("keeps the first value of a repeated shared label", async () => {
    const payloads = await new HeuristicFormExtractor().extract("DAP: 4\nSpecies: Pig\nSpecies: Human");

    expect(payloads.DAP?.experiment_target).toBe("Pig");
  });

  it("returns nothing when no metric line is present", async () => {
    await expect(new HeuristicFormExtractor().extract("Species: Rat\nNOAEL: not established")).resolves.toEqual({});
  });
});
