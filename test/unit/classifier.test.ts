import { describe, it, expect } from "vitest";
import { SectionClassifier } from "../../src/distill/classifier.js";
import { buildClassifierTable } from "../../src/distill/tables.js";

describe("SectionClassifier", () => {
  const classifier = new SectionClassifier();

  it("assigns lines to sections by keyword", () => {
    expect(classifier.classify("Likes to weigh evidence before deciding")).toBe("DecisionApproach");
    expect(classifier.classify("Learns best by building small prototypes")).toBe("LearningStyle");
    expect(classifier.classify("Ships code in small increments every day")).toBe("ExecutionTendencies");
    expect(classifier.classify("Very good at debugging gnarly production issues")).toBe(
      "CognitiveStrengths",
    );
    expect(classifier.classify("Works with [NAME] on a project for [CUSTOMER_ID]")).toBe(
      "ExperienceThemes",
    );
  });

  it("takes the first section in table order when several match", () => {
    expect(classifier.classify("I think in systems and feedback loops")).toBe(
      "CoreThinkingPatterns",
    );
  });

  it("matches keywords only at the start of a word", () => {
    expect(classifier.inspect("Prefers to rethink nothing at all")).toEqual({
      section: null,
      reason: "unmatched",
    });
  });

  it("discards layout lines", () => {
    expect(classifier.inspect("## Core Thinking")).toEqual({ section: null, reason: "structural" });
    expect(classifier.inspect("| team | project |")).toEqual({
      section: null,
      reason: "structural",
    });
    expect(classifier.inspect("   ")).toEqual({ section: null, reason: "empty" });
  });

  it("discards template boilerplate", () => {
    expect(classifier.inspect("(Important facts about the user)").section).toBeNull();
    expect(classifier.inspect("TODO: fill this in later please")).toEqual({
      section: null,
      reason: "boilerplate",
    });
    expect(classifier.inspect("Cognition Model Version: 2.0")).toEqual({
      section: null,
      reason: "boilerplate",
    });
  });

  it("does not count placeholders towards the minimum length", () => {
    expect(classifier.inspect("Think deeply")).toEqual({ section: null, reason: "too_short" });
    expect(classifier.inspect("[NAME] [EMAIL] learns fast")).toEqual({
      section: null,
      reason: "too_short",
    });
  });

  it("drops lines that match no section", () => {
    expect(classifier.classify("Enjoys cooking pasta on weekends")).toBeNull();
  });

  it("accepts a custom table and minimum", () => {
    const custom = new SectionClassifier({
      table: buildClassifierTable({
        sections: [{ section: "LearningStyle", keywords: ["Read"] }],
      }),
      minTokens: 2,
    });
    expect(custom.classify("Reads papers")).toBe("LearningStyle");
    expect(custom.classify("Writes papers")).toBeNull();
  });

  it("rejects tables naming unknown sections", () => {
    expect(() =>
      buildClassifierTable({ sections: [{ section: "Hobbies", keywords: ["golf"] }] }),
    ).toThrow();
  });
});
