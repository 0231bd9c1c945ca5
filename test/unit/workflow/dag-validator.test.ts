import { describe, it, expect } from "vitest";
import { findCycle, topologicalOrder, validateSteps } from "../../../src/workflow/dag-validator.js";
import { makeStep } from "../../../src/workflow/types.js";

const ids = (steps: ReadonlyArray<{ id: string }>) => steps.map((s) => s.id);

describe("validateSteps", () => {
  describe("valid graphs", () => {
    it("accepts an empty step list", () => {
      expect(validateSteps([])).toEqual([]);
    });

    it("accepts a linear chain", () => {
      const steps = [makeStep("a", "x"), makeStep("b", "x", {}, ["a"]), makeStep("c", "x", {}, ["b"])];
      expect(validateSteps(steps)).toEqual([]);
    });

    it("accepts a diamond", () => {
      const steps = [
        makeStep("start", "x"),
        makeStep("left", "x", {}, ["start"]),
        makeStep("right", "x", {}, ["start"]),
        makeStep("end", "x", {}, ["left", "right"]),
      ];
      expect(validateSteps(steps)).toEqual([]);
    });
  });

  describe("structural errors", () => {
    it("reports each duplicate id", () => {
      const errors = validateSteps([makeStep("a", "x"), makeStep("a", "y")]);
      expect(errors).toEqual([{ stepId: "a", field: "id", message: "Duplicate step ID: a" }]);
    });

    it("reports unknown dependencies", () => {
      const errors = validateSteps([makeStep("a", "x", {}, ["ghost"])]);
      expect(errors.map((e) => e.message)).toEqual(["Step 'a' depends on unknown step 'ghost'"]);
    });

    it("reports duplicates and missing dependencies together", () => {
      const errors = validateSteps([
        makeStep("a", "x"),
        makeStep("a", "x"),
        makeStep("b", "x", {}, ["missing"]),
      ]);
      expect(errors.map((e) => e.field)).toEqual(["id", "depends_on"]);
    });

    it("skips cycle detection when the graph is already malformed", () => {
      const errors = validateSteps([
        makeStep("a", "x", {}, ["b"]),
        makeStep("b", "x", {}, ["a"]),
        makeStep("c", "x", {}, ["nope"]),
      ]);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).not.toContain("cycle");
    });
  });

  describe("cycles", () => {
    it("reports a two-step cycle", () => {
      const errors = validateSteps([makeStep("s1", "x", {}, ["s2"]), makeStep("s2", "x", {}, ["s1"])]);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toContain("cycle");
    });

    it("reports a self-dependency", () => {
      const errors = validateSteps([makeStep("s1", "x", {}, ["s1"])]);
      expect(errors[0]?.message).toBe("Dependency cycle detected: s1 -> s1");
    });

    it("reports a cycle reachable only through an acyclic prefix", () => {
      const errors = validateSteps([
        makeStep("root", "x"),
        makeStep("a", "x", {}, ["root", "c"]),
        makeStep("b", "x", {}, ["a"]),
        makeStep("c", "x", {}, ["b"]),
      ]);
      expect(errors.some((e) => e.message.includes("cycle"))).toBe(true);
    });
  });
});

describe("findCycle", () => {
  it("returns null for an acyclic graph", () => {
    expect(findCycle([makeStep("a", "x"), makeStep("b", "x", {}, ["a"])])).toBeNull();
  });

  it("returns the steps on the cycle", () => {
    const cycle = findCycle([
      makeStep("a", "x", {}, ["c"]),
      makeStep("b", "x", {}, ["a"]),
      makeStep("c", "x", {}, ["b"]),
    ]);
    expect([...(cycle ?? [])].sort()).toEqual(["a", "b", "c"]);
  });

  it("reports only the step on a self-dependency reached through another step", () => {
    const steps = [makeStep("b", "x", {}, ["a"]), makeStep("a", "x", {}, ["a"])];
    expect(findCycle(steps)).toEqual(["a", "a"]);
    expect(validateSteps(steps).map((e) => e.message)).toEqual(["Dependency cycle detected: a -> a"]);
  });
});

describe("topologicalOrder", () => {
  it("orders a chain by dependency", () => {
    const steps = [makeStep("c", "x", {}, ["b"]), makeStep("b", "x", {}, ["a"]), makeStep("a", "x")];
    expect(ids(topologicalOrder(steps))).toEqual(["a", "b", "c"]);
  });

  it("breaks ties lexicographically", () => {
    const steps = [makeStep("zeta", "x"), makeStep("alpha", "x"), makeStep("mid", "x")];
    expect(ids(topologicalOrder(steps))).toEqual(["alpha", "mid", "zeta"]);
  });

  it("takes the smallest ready id after each removal", () => {
    // b unblocks only after root; "a2" is ready from the start
    const steps = [
      makeStep("root", "x"),
      makeStep("b", "x", {}, ["root"]),
      makeStep("a2", "x"),
      makeStep("c", "x", {}, ["b", "a2"]),
    ];
    expect(ids(topologicalOrder(steps))).toEqual(["a2", "root", "b", "c"]);
  });

  it("uses code-unit order, not locale order", () => {
    const steps = [makeStep("b", "x"), makeStep("B", "x"), makeStep("a", "x")];
    expect(ids(topologicalOrder(steps))).toEqual(["B", "a", "b"]);
  });
});
