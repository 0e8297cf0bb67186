import { PolicyError } from "../datalog/errors";
import { Event, TheoryKind } from "../datalog/syntax";
import { isUpdate } from "../datalog/syntaxUtils";
import { FormulaValidator, TheoryLookup } from "../datalog/validator";

/**
 * Everything a checker needs to know about the theory it validates.
 */
export type CheckTarget = {
  name: string | undefined;
  theories: TheoryLookup;
  validator: FormulaValidator;
};

/**
 * Validates changesets before they are applied to a theory.
 */
export interface UpdateChecker {
  readonly kind: TheoryKind;
  /**
   * Returns the errors applying `events` would cause. Never mutates anything.
   */
  check(target: CheckTarget, events: readonly Event[]): PolicyError[];
}

/**
 * Variants of rule theories, distinguished by the checks they run.
 */
export type TheoryVariant = "nonrecursive" | "action" | "unsafe";

/**
 * Full structural checks for theories that hold ordinary rules.
 *
 * Recursion is not checked here: the caller is expected to use the
 * dependency graph of the theory for that.
 */
export class NonrecursiveChecker implements UpdateChecker {
  readonly kind = "nonrecursive";

  check(target: CheckTarget, events: readonly Event[]): PolicyError[] {
    const { name, theories, validator } = target;
    const errors: PolicyError[] = [];
    for (const event of events) {
      const formula = event.formula;
      if (!validator.isDatalog(formula)) {
        errors.push(PolicyError.malformed(formula));
      } else if (validator.isAtom(formula)) {
        errors.push(...validator.factErrors(formula, theories, name));
      } else {
        errors.push(...validator.ruleErrors(formula, theories, name));
      }
    }
    return errors;
  }
}

/**
 * Checks for action theories. Rule heads may only reference another theory
 * when they are update atoms (`p+`, `p-`).
 *
 * Negation safety of action rules is not checked: some tables are only
 * meaningful for particular bound arguments, which the checks cannot
 * express yet.
 */
export class ActionChecker implements UpdateChecker {
  readonly kind = "action";

  check(target: CheckTarget, events: readonly Event[]): PolicyError[] {
    const { name, theories, validator } = target;
    const errors: PolicyError[] = [];
    for (const event of events) {
      const formula = event.formula;
      if (!validator.isDatalog(formula)) {
        errors.push(PolicyError.malformed(formula));
      } else if (validator.isAtom(formula)) {
        errors.push(...validator.factErrors(formula, theories, name));
      } else {
        errors.push(...validator.ruleHeadHasNoTheory(formula, isUpdate));
      }
    }
    return errors;
  }
}

/**
 * No checks at all, for trusted bulk loading.
 */
export class UnsafeChecker implements UpdateChecker {
  readonly kind = "nonrecursive";

  check(_target: CheckTarget, _events: readonly Event[]): PolicyError[] {
    return [];
  }
}

export function makeChecker(variant: TheoryVariant): UpdateChecker {
  switch (variant) {
    case "nonrecursive":
      return new NonrecursiveChecker();
    case "action":
      return new ActionChecker();
    case "unsafe":
      return new UnsafeChecker();
  }
}
