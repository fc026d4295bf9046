import { describe, it, expect } from "vitest";
import { renderCognitionDocument } from "../../src/cognition/writer.js";
import { Distiller, orderSources, toCandidate } from "../../src/distill/distiller.js";
import type { MemorySource } from "../../src/distill/types.js";
import { RedactionError } from "../../src/errors.js";
import { Redactor } from "../../src/redaction/redactor.js";

function fact(text: string): MemorySource {
  return { kind: "fact", path: "MEMORY.md", text };
}

function event(text: string): MemorySource {
  return { kind: "event", path: "HISTORY.md", text };
}

function bulletsOf(distiller: Distiller, sources: MemorySource[], section: string): readonly string[] {
  const found = distiller.distill(sources).sections.find((s) => s.name === section);
  return found ? found.bullets : [];
}

class ThrowingRegExp extends RegExp {
  override [Symbol.replace](): string {
    throw new Error("matcher exploded");
  }
}

describe("Distiller", () => {
  const distiller = new Distiller();

  it("turns an identifying line into an abstract experience theme", () => {
    const source = fact(
      "# Long-term Memory\n\n- Works with Jane Doe (jane@acme.com) on project Falcon, customer ACME-2024-001\n",
    );
    const report = distiller.distillDetailed([source]);

    const themes = report.profile.sections.find((s) => s.name === "ExperienceThemes");
    expect(themes?.bullets).toEqual(["Works with a colleague on a project for a customer"]);
    expect(report.candidates).toBe(2);
    expect(report.kept).toBe(1);
    expect(report.dropped).toEqual({ structural: 1 });
    expect(report.redactions.Name).toBe(1);
    expect(report.redactions.Email).toBe(1);
    expect(report.redactions.CustomerId).toBe(1);

    const doc = renderCognitionDocument(report.profile);
    for (const leaked of ["Jane", "Doe", "acme", "Falcon", "ACME", "2024"]) {
      expect(doc.includes(leaked)).toBe(false);
    }
  });

  it("always yields all six sections", () => {
    const profile = distiller.distill([fact("nothing useful here")]);
    expect(profile.sections.map((s) => s.name)).toEqual([
      "CoreThinkingPatterns",
      "DecisionApproach",
      "LearningStyle",
      "ExecutionTendencies",
      "CognitiveStrengths",
      "ExperienceThemes",
    ]);
    expect(profile.sections.every((s) => s.bullets.length === 0)).toBe(true);
    expect(profile.modelVersion).toBe("2.0");
  });

  it("puts facts ahead of events", () => {
    const sources = [
      event("- Shipped the billing migration over one weekend"),
      fact("- Ships in small steps behind feature flags"),
    ];
    expect(bulletsOf(distiller, sources, "ExecutionTendencies")).toEqual([
      "Ships in small steps behind feature flags",
      "Shipped the billing migration over one weekend",
    ]);
  });

  it("drops duplicates regardless of case", () => {
    const report = distiller.distillDetailed([
      fact("- Ships in small steps behind feature flags\n- ships in small steps behind feature flags"),
    ]);
    expect(report.kept).toBe(1);
    expect(report.dropped).toEqual({ duplicate: 1 });
  });

  it("caps bullets per section", () => {
    const capped = new Distiller({ maxBulletsPerSection: 1 });
    const report = capped.distillDetailed([
      fact("- Ships in small steps behind feature flags\n- Shipped the billing migration over one weekend"),
    ]);
    expect(report.kept).toBe(1);
    expect(report.dropped).toEqual({ section_full: 1 });
  });

  it("drops a line with a proper noun it cannot explain", () => {
    const report = distiller.distillDetailed([fact("- Worked on Kubernetes upgrades for Globex")]);
    expect(report.kept).toBe(0);
    expect(report.dropped).toEqual({ uncertain: 1 });
  });

  it("drops a line opening with a single-word name", () => {
    const report = distiller.distillDetailed([
      fact("- Alice taught me to validate risky assumptions early"),
    ]);
    expect(report.kept).toBe(0);
    expect(report.dropped).toEqual({ uncertain: 1 });
  });

  it("drops a line with a name after a full stop", () => {
    const report = distiller.distillDetailed([
      fact("- Decided to ship weekly. Bob agreed it reduced delivery risk a lot"),
    ]);
    expect(report.kept).toBe(0);
    expect(report.dropped).toEqual({ uncertain: 1 });
  });

  it("keeps a second sentence that opens with a common word", () => {
    expect(
      bulletsOf(distiller, [fact("- Decided to ship weekly. It reduced delivery risk a lot")], "DecisionApproach"),
    ).toEqual(["Decided to ship weekly. It reduced delivery risk a lot"]);
  });

  it("removes an address on a www host in full", () => {
    expect(
      bulletsOf(
        distiller,
        [fact("- Always validate risk with jane.doe@www.acme.io before launch")],
        "DecisionApproach",
      ),
    ).toEqual(["Always validate risk before launch"]);
  });

  it("fails closed when redaction fails", () => {
    const broken = new Distiller({
      redactor: new Redactor({
        rules: [
          {
            category: "Other",
            placeholder: "[REDACTED]",
            description: "broken",
            patterns: [new ThrowingRegExp("x", "g")],
          },
        ],
      }),
    });
    expect(() => broken.distill([fact("- Thinks in first principles every day")])).toThrow(
      RedactionError,
    );
  });
});

describe("Distiller.generalize", () => {
  const distiller = new Distiller();

  it("collapses several names into colleagues and drops dates", () => {
    expect(distiller.generalize("Met [NAME] and [NAME] on [DATE] about pricing")).toBe(
      "Met colleagues about pricing",
    );
  });

  it("abstracts named products behind a cue noun", () => {
    expect(distiller.generalize("Deployed the service Atlas to production")).toBe(
      "Deployed a service to production",
    );
  });

  it("returns null when nothing or something identifying is left", () => {
    expect(distiller.generalize("[EMAIL]")).toBeNull();
    expect(distiller.generalize("Uses an internal tool named Zephyr")).toBeNull();
  });
});

describe("source helpers", () => {
  it("orders facts first and keeps the rest stable", () => {
    const a = event("a");
    const b = fact("b");
    const c = event("c");
    expect(orderSources([a, b, c])).toEqual([b, a, c]);
  });

  it("strips list and inline markup", () => {
    expect(toCandidate("  - [x] **Ships** `often`")).toBe("Ships often");
    expect(toCandidate("2. Learns by doing")).toBe("Learns by doing");
  });
});
