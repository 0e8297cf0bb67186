export type OutputFormat = "json" | "plain";

/**
 * Exit codes after executing policy-theory.
 */
export enum ExitCode {
  /**
   * Successful execution. No errors reported.
   */
  SUCCESS = 0,
  /**
   * Policy errors were reported.
   */
  ERRORS = 1,
  /**
   * Execution failed because of an error.
   */
  EXECUTION_FAILURE = 2,
}
