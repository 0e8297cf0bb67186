import { formatFormula } from "./prettyPrinter";
import { Formula, Location } from "./syntax";

export type PolicyErrorCode =
  | "malformed"
  | "fact-not-ground"
  | "fact-has-theory"
  | "arity-mismatch"
  | "unsafe-head"
  | "unsafe-negation"
  | "head-has-theory"
  | "recursion"
  | "stratification";

/**
 * A problem found in a policy statement.
 *
 * Policy errors are reported as values by the validation routines and
 * never thrown by them.
 */
export class PolicyError extends Error {
  constructor(
    public readonly code: PolicyErrorCode,
    public readonly msg: string,
    public readonly formula: unknown,
  ) {
    super(msg);
    this.name = "PolicyError";
  }

  /**
   * Creates an error about `formula`. The message is prefixed with the
   * position of the formula when it is known.
   */
  public static make(
    code: PolicyErrorCode,
    description: string,
    formula: Formula,
  ): PolicyError {
    return new PolicyError(
      code,
      `${formatLocation(formula.location)}${description}: ${formatFormula(formula)}`,
      formula,
    );
  }

  /**
   * Error for a value that is not a well-formed formula.
   */
  public static malformed(value: unknown): PolicyError {
    let text: string;
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
    return new PolicyError("malformed", `Non-formula found: ${text}`, value);
  }
}

function formatLocation(loc: Location | undefined): string {
  if (loc === undefined) return "";
  const file = loc.file === undefined ? "" : `${loc.file}:`;
  return `${file}${loc.line}:${loc.col}: `;
}
