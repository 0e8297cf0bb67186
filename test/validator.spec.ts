import {
  DatalogValidator,
  TheoryLookup,
  atom,
  fact,
  isUpdate,
  not,
  rule,
  variable,
} from "../src/internals/datalog";

describe("DatalogValidator", () => {
  const validator = new DatalogValidator();
  const x = variable("x");
  const y = variable("y");
  const noTheories: TheoryLookup = { arity: () => undefined };
  const arities: TheoryLookup = {
    arity: (table, theory) =>
      table === "owner" && theory === "cls" ? 2 : undefined,
  };

  describe("reorderForSafety", () => {
    it("should move negated literals after the literals binding them", () => {
      const r = rule(atom("h", [x]), [not(atom("r", [x])), atom("p", [x])]);
      expect(validator.reorderForSafety(r)).toEqual(
        rule(atom("h", [x]), [atom("p", [x]), not(atom("r", [x]))]),
      );
    });

    it("should keep literals that never become safe at the end", () => {
      const r = rule(atom("h", [x]), [
        not(atom("r", [y])),
        atom("p", [x]),
        not(atom("s", [x])),
      ]);
      expect(validator.reorderForSafety(r)).toEqual(
        rule(atom("h", [x]), [
          atom("p", [x]),
          not(atom("s", [x])),
          not(atom("r", [y])),
        ]),
      );
    });

    it("should return safe rules and atoms unchanged", () => {
      const r = rule(atom("h", [x]), [atom("p", [x]), not(atom("r", [x]))]);
      expect(validator.reorderForSafety(r)).toBe(r);
      const a = atom("p", [1]);
      expect(validator.reorderForSafety(a)).toBe(a);
    });
  });

  describe("isDatalog", () => {
    it("should accept formulas built with the constructors", () => {
      expect(validator.isDatalog(atom("p", [1, x]))).toBe(true);
      expect(
        validator.isDatalog(rule(atom("h", [x]), [not(atom("p", [x]))])),
      ).toBe(true);
    });

    it("should reject malformed values", () => {
      expect(validator.isDatalog("p(1)")).toBe(false);
      expect(validator.isDatalog(null)).toBe(false);
      expect(validator.isDatalog({ kind: "atom", table: "", args: [] })).toBe(
        false,
      );
      expect(
        validator.isDatalog({
          kind: "rule",
          head: atom("h"),
          body: [{ kind: "literal", atom: atom("p") }],
        }),
      ).toBe(false);
      expect(
        validator.isDatalog({
          kind: "atom",
          table: "p",
          args: [{ kind: "constant", value: NaN }],
        }),
      ).toBe(false);
    });
  });

  describe("factErrors", () => {
    it("should accept ground facts", () => {
      expect(validator.factErrors(fact("p", [1]), noTheories, "cls")).toEqual(
        [],
      );
    });

    it("should require ground facts", () => {
      const errors = validator.factErrors(atom("p", [x]), noTheories, "cls");
      expect(errors.map((err) => err.code)).toEqual(["fact-not-ground"]);
      expect(errors[0].message).toBe("Facts must be ground: p(x)");
    });

    it("should forbid theory tags in facts", () => {
      const errors = validator.factErrors(
        atom("p", [1], { theory: "nova" }),
        noTheories,
        "cls",
      );
      expect(errors.map((err) => err.message)).toEqual([
        "Facts may not reference another theory: nova:p(1)",
      ]);
    });

    it("should compare the arity with the known table", () => {
      const errors = validator.factErrors(fact("owner", ["vm1"]), arities, "cls");
      expect(errors.map((err) => err.message)).toEqual([
        'Table cls:owner has arity 2, but is used with 1 arguments: owner("vm1")',
      ]);
      expect(
        validator.factErrors(fact("owner", ["vm1", "alice"]), arities, "cls"),
      ).toEqual([]);
    });

    it("should prefix messages with the location", () => {
      const errors = validator.factErrors(
        atom("p", [x], { location: { file: "a.json", line: 3, col: 5 } }),
        noTheories,
        undefined,
      );
      expect(errors[0].message).toBe("a.json:3:5: Facts must be ground: p(x)");
    });
  });

  describe("ruleErrors", () => {
    it("should accept safe rules", () => {
      const r = rule(atom("h", [x]), [atom("p", [x]), not(atom("q", [x]))]);
      expect(validator.ruleErrors(r, noTheories, "cls")).toEqual([]);
    });

    it("should report head variables missing from the body", () => {
      const r = rule(atom("h", [x, y]), [atom("p", [x])]);
      const errors = validator.ruleErrors(r, noTheories, "cls");
      expect(errors.map((err) => err.code)).toEqual(["unsafe-head"]);
      expect(errors[0].message).toBe(
        "Variables in the head must appear in a positive body literal: y: h(x, y) :- p(x)",
      );
    });

    it("should report unsafe negation", () => {
      const r = rule(atom("h", [x]), [atom("p", [x]), not(atom("q", [y]))]);
      const errors = validator.ruleErrors(r, noTheories, "cls");
      expect(errors.map((err) => err.code)).toEqual(["unsafe-negation"]);
      expect(errors[0].message).toBe(
        "Variables in negated literals must appear in a positive literal: y: h(x) :- p(x), not q(y)",
      );
    });

    it("should report heads referencing another theory", () => {
      const r = rule(atom("h", [x], { theory: "nova" }), [atom("p", [x])]);
      const errors = validator.ruleErrors(r, noTheories, "cls");
      expect(errors.map((err) => err.message)).toEqual([
        "Rule head may not reference theory nova: nova:h(x) :- p(x)",
      ]);
    });

    it("should check the arity of body literals", () => {
      const r = rule(atom("h", [x]), [atom("owner", [x])]);
      const errors = validator.ruleErrors(r, arities, "cls");
      expect(errors.map((err) => err.code)).toEqual(["arity-mismatch"]);
    });

    it("should look up tagged literals in their own theory", () => {
      const r = rule(atom("h", [x]), [atom("owner", [x], { theory: "nova" })]);
      expect(validator.ruleErrors(r, arities, "cls")).toEqual([]);
    });
  });

  it("should permit update heads referencing another theory", () => {
    const r = rule(atom("reboot+", [x], { theory: "nova" }), [atom("p", [x])]);
    expect(validator.ruleHeadHasNoTheory(r, isUpdate)).toEqual([]);
    const plain = rule(atom("reboot", [x], { theory: "nova" }), [
      atom("p", [x]),
    ]);
    expect(validator.ruleHeadHasNoTheory(plain, isUpdate)).toHaveLength(1);
  });
});
