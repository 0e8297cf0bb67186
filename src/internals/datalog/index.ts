export {
  Atom,
  Constant,
  Event,
  Formula,
  Literal,
  Location,
  Rule,
  Term,
  TheoryKind,
  Variable,
} from "./syntax";
export {
  atom,
  constant,
  deleteEvent,
  fact,
  insertEvent,
  literal,
  not,
  rule,
  variable,
} from "./syntaxConstructors";
export {
  atomVariables,
  eqFormulas,
  formulaKey,
  headTable,
  isAtom,
  isFact,
  isGround,
  isRule,
  isUpdate,
  qualifiedTable,
  toRule,
} from "./syntaxUtils";
export {
  DatalogPrettyPrinter,
  formatEvents,
  formatFormula,
} from "./prettyPrinter";
export { PolicyError, PolicyErrorCode } from "./errors";
export { RuleSet } from "./ruleSet";
export {
  DatalogValidator,
  FormulaValidator,
  TheoryLookup,
} from "./validator";
export { RuleDependencyGraph, NEGATION_LABEL } from "./dependencyGraph";
