import {
  DatalogValidator,
  Formula,
  atom,
  deleteEvent,
  fact,
  formulaKey,
  headTable,
  insertEvent,
  not,
  rule,
  toRule,
  variable,
} from "../src/internals/datalog";
import { Logger } from "../src/internals/logger";
import {
  RuleTheory,
  TheoryRegistry,
  createTheory,
} from "../src/internals/theory";

/**
 * Fails to reorder rules defining the `bad` table.
 */
class ThrowingValidator extends DatalogValidator {
  public override reorderForSafety(formula: Formula): Formula {
    if (headTable(formula) === "bad") {
      throw new Error("cannot reorder");
    }
    return super.reorderForSafety(formula);
  }
}

function keys(formulas: Formula[]): Set<string> {
  return new Set(formulas.map((formula) => formulaKey(toRule(formula))));
}

describe("RuleTheory", () => {
  const x = variable("x");

  describe("updates", () => {
    it("should apply an insert only once", () => {
      const theory = RuleTheory.nonrecursive();
      const r = rule(atom("q", [x]), [atom("p", [x])]);
      expect(theory.insert(r)).toEqual([r]);
      expect(theory.insert(rule(atom("q", [x]), [atom("p", [x])]))).toEqual(
        [],
      );
      expect(theory.content()).toHaveLength(1);
    });

    it("should ignore deletions of absent formulas", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("p", [1]));
      expect(theory.delete(fact("p", [2]))).toEqual([]);
      expect(theory.delete(rule(atom("q", [x]), [atom("p", [x])]))).toEqual(
        [],
      );
      expect(theory.content()).toEqual([toRule(fact("p", [1]))]);
    });

    it("should return the events that changed the theory", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("p", [1]));
      const events = [
        insertEvent(fact("p", [1])),
        insertEvent(fact("p", [2])),
        deleteEvent(fact("p", [1])),
        deleteEvent(fact("p", [3])),
      ];
      expect(theory.update(events)).toEqual([events[1], events[2]]);
      expect(theory.content()).toEqual([toRule(fact("p", [2]))]);
    });

    it("should store rules reordered for safety", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(rule(atom("h", [x]), [not(atom("r", [x])), atom("p", [x])]));
      expect(theory.content()).toEqual([
        rule(atom("h", [x]), [atom("p", [x]), not(atom("r", [x]))]),
      ]);
      expect(
        theory.contains(
          rule(atom("h", [x]), [atom("p", [x]), not(atom("r", [x]))]),
        ),
      ).toBe(true);
    });

    it("should find a stored rule given in its original order", () => {
      const theory = RuleTheory.nonrecursive();
      const unordered = rule(atom("h", [x]), [
        not(atom("r", [x])),
        atom("p", [x]),
      ]);
      expect(theory.insert(unordered)).toHaveLength(1);
      expect(theory.insert(unordered)).toEqual([]);
      expect(theory.contains(unordered)).toBe(true);
      theory.delete(unordered);
      expect(theory.contains(unordered)).toBe(false);
    });

    it("should keep the events applied before a failure", () => {
      const logger = new Logger(undefined, true);
      const theory = RuleTheory.nonrecursive({
        name: "cls",
        validator: new ThrowingValidator(),
        logger,
      });
      expect(() =>
        theory.update([
          insertEvent(fact("p", [1])),
          insertEvent(fact("bad", [1])),
          insertEvent(fact("p", [2])),
        ]),
      ).toThrow("cannot reorder");
      expect(theory.contains(fact("p", [1]))).toBe(true);
      expect(theory.contains(fact("p", [2]))).toBe(false);
      expect(logger.getJsonLogs().error).toEqual([
        "[cls] Update failed after 1 changes: cannot reorder",
      ]);
    });
  });

  describe("define and content", () => {
    it("should return what was defined", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("old", [0]));
      const rules: Formula[] = [
        fact("p", [1]),
        fact("p", [2]),
        rule(atom("q", [x]), [atom("p", [x]), not(atom("r", [x]))]),
      ];
      theory.define(rules);
      expect(keys(theory.content())).toEqual(keys(rules));
      expect(theory.definedTablenames()).toEqual(["p", "q"]);
    });

    it("should exclude facts from the policy", () => {
      const theory = RuleTheory.nonrecursive();
      const r = rule(atom("q"), [atom("p")]);
      theory.insert(atom("p"));
      theory.insert(r);
      expect(theory.policy()).toEqual([r]);
    });

    it("should return the content of selected tables", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("p", [1]));
      theory.insert(fact("q", [1]));
      expect(theory.content(["q"])).toEqual([toRule(fact("q", [1]))]);
      expect(theory.content(["missing"])).toEqual([]);
    });
  });

  describe("empty", () => {
    function populated(): RuleTheory {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("p", [1]));
      theory.insert(fact("q", [1]));
      theory.insert(fact("r", [1]));
      return theory;
    }

    it("should remove everything", () => {
      const theory = populated();
      theory.empty();
      expect(theory.content()).toEqual([]);
      expect(theory.dependencyGraph.getNodes()).toEqual([]);
    });

    it("should remove the listed tables", () => {
      const theory = populated();
      theory.empty(["p", "missing"]);
      expect(theory.definedTablenames()).toEqual(["q", "r"]);
    });

    it("should keep only the listed tables when inverted", () => {
      const theory = populated();
      theory.empty(["q"], true);
      expect(theory.definedTablenames()).toEqual(["q"]);
      expect(theory.dependencyGraph.getNodes()).toEqual(["q"]);
    });
  });

  describe("initializeTables", () => {
    it("should replace the contents of a table", () => {
      const theory = RuleTheory.nonrecursive();
      theory.initializeTables(["p"], [fact("p", [1]), fact("p", [2])]);
      theory.initializeTables(["p"], [fact("p", [3])]);
      expect(theory.content(["p"])).toEqual([toRule(fact("p", [3]))]);
    });

    it("should clear listed tables without facts and unlisted tables with facts", () => {
      const theory = RuleTheory.nonrecursive();
      theory.insert(fact("p", [1]));
      theory.insert(fact("q", [1]));
      theory.insert(fact("r", [1]));
      theory.initializeTables(["p"], [fact("q", [2])]);
      expect(theory.content()).toEqual([
        toRule(fact("r", [1])),
        toRule(fact("q", [2])),
      ]);
    });

    it("should log the number of loaded facts", () => {
      const logger = new Logger(undefined, true);
      const theory = RuleTheory.nonrecursive({ name: "cls", logger });
      theory.initializeTables(["p"], [fact("p", [1]), fact("p", [2])]);
      expect(logger.getJsonLogs().info).toEqual([
        "[cls] Initialized 1 tables with 2 facts",
      ]);
    });
  });

  describe("lookups", () => {
    const theory = RuleTheory.unsafe();
    const r = rule(atom("p", [x], { theory: "nova" }), [atom("q", [x])]);
    theory.insert(r);
    theory.insert(fact("s", [1, 2]));

    it("should report arities", () => {
      expect(theory.arity("p")).toBe(1);
      expect(theory.arity("s")).toBe(2);
      expect(theory.arity("missing")).toBeUndefined();
      expect(theory.getAritySelf("p", "nova")).toBe(1);
      expect(theory.getAritySelf("p", "other")).toBeUndefined();
    });

    it("should return the rules that could match a literal", () => {
      expect(theory.headIndex("p", atom("p", [2]))).toEqual([r]);
      expect(theory.headIndex("s", atom("s", [3, variable("y")]))).toEqual([]);
      expect(theory.headIndex("missing")).toEqual([]);
    });

    it("should expose heads and bodies for evaluation", () => {
      expect(theory.head(r)).toBe(r.head);
      expect(theory.body(r)).toBe(r.body);
    });
  });

  describe("validation", () => {
    it("should report errors without changing the theory", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls" });
      const errors = theory.updateWouldCauseErrors([
        insertEvent(rule(atom("h", [x, variable("y")]), [atom("p", [x])])),
        insertEvent(atom("p", [x])),
      ]);
      expect(errors.map((err) => err.code)).toEqual([
        "unsafe-head",
        "fact-not-ground",
      ]);
      expect(theory.content()).toEqual([]);
    });

    it("should report malformed formulas", () => {
      const theory = RuleTheory.nonrecursive();
      const errors = theory.updateWouldCauseErrors([
        insertEvent({ kind: "atom", table: "", args: [] }),
      ]);
      expect(errors.map((err) => err.message)).toEqual([
        'Non-formula found: {"kind":"atom","table":"","args":[]}',
      ]);
    });

    it("should let action theories write to other theories", () => {
      const theory = RuleTheory.action({ name: "act" });
      expect(theory.kind).toBe("action");
      const errors = theory.updateWouldCauseErrors([
        insertEvent(
          rule(atom("reboot+", [x], { theory: "nova" }), [
            atom("p", [x]),
            not(atom("q", [variable("y")])),
          ]),
        ),
        insertEvent(rule(atom("stop", [x], { theory: "nova" }), [atom("p", [x])])),
      ]);
      expect(errors.map((err) => err.code)).toEqual(["head-has-theory"]);
    });

    it("should accept anything in unsafe theories", () => {
      const theory = createTheory("unsafe");
      expect(theory.kind).toBe("nonrecursive");
      expect(
        theory.updateWouldCauseErrors([insertEvent(atom("p", [x]))]),
      ).toEqual([]);
    });

    it("should check arities against sibling theories", () => {
      const registry = new TheoryRegistry();
      const nova = registry.add(RuleTheory.nonrecursive({ name: "nova" }));
      nova.insert(fact("servers", ["vm1", "active"]));
      const cls = registry.add(RuleTheory.nonrecursive({ name: "cls" }));
      const errors = cls.updateWouldCauseErrors([
        insertEvent(
          rule(atom("err", [x]), [atom("servers", [x], { theory: "nova" })]),
        ),
      ]);
      expect(errors.map((err) => err.message)).toEqual([
        "Table nova:servers has arity 2, but is used with 1 arguments: err(x) :- nova:servers(x)",
      ]);
    });
  });

  describe("dependency graph", () => {
    it("should mirror inserted and deleted rules", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls" });
      const r = rule(atom("err", [x]), [atom("vm", [x]), not(atom("ok", [x]))]);
      theory.insert(r);
      const graph = theory.dependencyGraph;
      expect(graph.edgeIn("cls:err", "cls:vm")).toBe(true);
      expect(graph.edgeIn("cls:err", "cls:ok", "-")).toBe(true);
      theory.delete(r);
      expect(graph.getNodes()).toEqual([]);
    });

    it("should report recursion", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls" });
      theory.insert(rule(atom("q", [x]), [atom("p", [x])]));
      theory.insert(rule(atom("p", [x]), [atom("q", [x])]));
      const errors = theory.recursionErrors();
      expect(errors.map((err) => err.code)).toEqual(["recursion"]);
      expect(errors[0].message).toBe(
        "Theory cls contains recursive rules: cls:q -> cls:p -> cls:q",
      );
    });

    it("should report recursion through negation as a stratification error", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls", abbr: "c" });
      theory.insert(rule(atom("p", [x]), [atom("q", [x]), not(atom("p", [x]))]));
      expect(theory.stratificationErrors(["-"]).map((err) => err.message)).toEqual(
        ['Theory c is not stratified with respect to "-"'],
      );
      expect(theory.stratificationErrors(["other"])).toEqual([]);
    });

    it("should check a long chain of rules for recursion", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls" });
      theory.update(
        Array.from({ length: 20000 }, (_, i) =>
          insertEvent(rule(atom(`t${i}`, [x]), [atom(`t${i + 1}`, [x])])),
        ),
      );
      expect(theory.recursionErrors()).toEqual([]);
      expect(theory.stratificationErrors(["-"])).toEqual([]);
    });

    it("should have no errors for stratified rules", () => {
      const theory = RuleTheory.nonrecursive({ name: "cls" });
      theory.insert(rule(atom("p", [x]), [atom("q", [x]), not(atom("r", [x]))]));
      expect(theory.recursionErrors()).toEqual([]);
      expect(theory.stratificationErrors(["-"])).toEqual([]);
    });
  });

  it("should log changes at the debug level", () => {
    const logger = new Logger(undefined, true);
    const theory = RuleTheory.nonrecursive({ name: "cls", logger });
    theory.insert(fact("p", [1]));
    expect(logger.getJsonLogs().debug).toEqual([
      "[cls] Update [+p(1)]",
      "[p] Insert: p(1)",
    ]);
  });
});

describe("TheoryRegistry", () => {
  it("should register named theories", () => {
    const registry = new TheoryRegistry();
    const theory = registry.add(createTheory("action", { name: "act" }));
    expect(registry.get("act")).toBe(theory);
    expect(theory.theories).toBe(registry);
    expect(registry.names()).toEqual(["act"]);
    expect([...registry]).toEqual([theory]);
    expect(registry.delete("act")).toBe(true);
    expect(registry.has("act")).toBe(false);
  });

  it("should reject unnamed and duplicate theories", () => {
    const registry = new TheoryRegistry();
    registry.add(RuleTheory.nonrecursive({ name: "cls" }));
    expect(() => registry.add(RuleTheory.nonrecursive({ name: "cls" }))).toThrow(
      "Theory cls is already defined",
    );
    expect(() => registry.add(RuleTheory.nonrecursive())).toThrow(
      "Cannot register a theory without a name",
    );
  });

  it("should look up arities by theory name", () => {
    const registry = new TheoryRegistry();
    registry.add(RuleTheory.nonrecursive({ name: "nova" })).insert(
      fact("servers", ["vm1", "active"]),
    );
    expect(registry.arity("servers", "nova")).toBe(2);
    expect(registry.arity("servers", "neutron")).toBeUndefined();
  });
});
