/**
 * Specialist prompt construction and industry detection.
 */

import { describe, it, expect } from "vitest";
import { detectIndustry } from "../../src/evaluation/invoker/industry.js";
import {
  buildSpecialistPrompt,
  summarizeDependencyContext,
  MAX_DEPENDENCY_CONTEXT_ENTRIES,
} from "../../src/evaluation/invoker/prompt.js";
import { SpecialistRegistry } from "../../src/evaluation/registry/index.js";
import { smallCatalog } from "../helpers/catalog.js";

describe("detectIndustry", () => {
  it.each([
    ["MealMate", "Weekly meal kits for busy parents", "Food & Delivery"],
    ["ClinicBook", "Booking software for a clinic", "Healthcare"],
    ["TutorBank", "Student loans from a bank", "Education"],
    ["Cartly", "An e-commerce checkout widget", "E-commerce"],
    ["PartsHub", "A supply chain tracker", "Manufacturing"],
    ["Fixly", "Repairing broken appliances at home", "General Business"],
  ])("classifies %s", (name, concept, industry) => {
    expect(detectIndustry(name, concept)).toBe(industry);
  });
});

describe("summarizeDependencyContext", () => {
  it("keeps at most eight entries and shortens long explanations", () => {
    const entries = Array.from({ length: 10 }, (_, i) => ({
      subParameter: `Sub ${i}`,
      score: 60 + i,
      explanation: i === 0 ? "x".repeat(300) : `Short ${i}.`,
    }));

    const summary = summarizeDependencyContext(entries);

    expect(summary).toHaveLength(MAX_DEPENDENCY_CONTEXT_ENTRIES);
    expect(summary[0]?.explanation).toBe(`${"x".repeat(237)}...`);
    expect(summary[7]).toEqual({ subParameter: "Sub 7", score: 67, explanation: "Short 7." });
  });
});

describe("buildSpecialistPrompt", () => {
  const registry = SpecialistRegistry.fromCatalog(smallCatalog());
  const pricing = registry.get("pricing");
  const alpha = registry.cluster("Alpha");
  const proposal = { name: "MealMate", concept: "Weekly meal kits for busy parents" };

  it("carries persona and role in the system prompt", () => {
    if (!pricing || !alpha) throw new Error("fixture catalog changed");
    const { system } = buildSpecialistPrompt(pricing, alpha, proposal, []);

    expect(system.split("\n").slice(0, 2)).toEqual([
      "You assess demand.",
      "Your role: Specialized validation expert for Pricing assessment.",
    ]);
  });

  it("lays out proposal, assignment and upstream assessments", () => {
    if (!pricing || !alpha) throw new Error("fixture catalog changed");
    const { prompt } = buildSpecialistPrompt(pricing, alpha, proposal, [
      { subParameter: "Market Size", score: 71.6, explanation: "Large addressable market." },
    ]);
    const lines = prompt.split("\n");

    expect(lines).toContain("Name: MealMate");
    expect(lines).toContain("Industry context: Food & Delivery");
    expect(lines).toContain("Cluster: Alpha Cluster (60% of the overall assessment)");
    expect(lines).toContain("Parameter: Positioning");
    expect(lines).toContain("Sub-parameter: Pricing");
    expect(lines).toContain("- Market Size: 72/100 - Large addressable market.");
    expect(lines).toContain('  "explanation": "<at most 75 words>",');
  });

  it("tells an independent specialist to work alone", () => {
    if (!pricing || !alpha) throw new Error("fixture catalog changed");
    const { prompt } = buildSpecialistPrompt(pricing, alpha, proposal, []);

    expect(prompt.split("\n")).toContain("No upstream assessments are available; evaluate independently.");
  });
});
