export {
  ActionChecker,
  CheckTarget,
  NonrecursiveChecker,
  TheoryVariant,
  UnsafeChecker,
  UpdateChecker,
  makeChecker,
} from "./checks";
export { RuleTheory, RuleTheoryOptions, createTheory } from "./theory";
export { TheoryRegistry } from "./registry";
