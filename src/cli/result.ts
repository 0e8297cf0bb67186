import { OutputFormat, ExitCode } from "./types";
import { PolicyErrorCode } from "../internals/datalog/errors";
import { TheoryKind } from "../internals/datalog/syntax";
import { unreachable } from "../internals/util";
import JSONbig from "json-bigint";

type LogMap = {
  logs?: Record<string, string[]>;
};

/**
 * Summary of a theory after all documents were loaded.
 */
export type TheoryReport = {
  name: string;
  kind: TheoryKind;
  tables: string[];
  rules: number;
  facts: number;
  /**
   * Stratum of each node of the dependency graph, `undefined` if the theory
   * cannot be stratified.
   */
  strata: Record<string, number> | undefined;
};

/**
 * A policy error attributed to the document it comes from.
 */
export type ErrorReport = {
  /** Document the error was found in, `undefined` for whole-theory checks. */
  file: string | undefined;
  theory: string;
  code: PolicyErrorCode;
  message: string;
};

/**
 * All documents were loaded and no errors were found.
 */
export type ResultOK = LogMap & {
  kind: "ok";
  theories: TheoryReport[];
};

/**
 * Policy errors were found.
 */
export type ResultErrors = LogMap & {
  kind: "errors";
  errors: ErrorReport[];
  theories: TheoryReport[];
};

/**
 * The requested operation could not be completed.
 */
export type ResultError = LogMap & {
  kind: "error";
  error: string;
};

export type Result = ResultOK | ResultErrors | ResultError;

function formatTheory(report: TheoryReport): string {
  const header = `${report.name} (${report.kind}): ${report.tables.length} tables, ${report.rules} rules, ${report.facts} facts`;
  if (report.strata === undefined) {
    return `${header}\n  not stratified`;
  }
  const strata = Object.entries(report.strata)
    .map(([node, stratum]) => `${node}=${stratum}`)
    .join(", ");
  return strata === "" ? header : `${header}\n  strata: ${strata}`;
}

function formatError(report: ErrorReport): string {
  const prefix = report.file === undefined ? report.theory : report.file;
  return `${prefix}: [${report.code}] ${report.message}`;
}

/**
 * Converts a result object to a readable string based on its kind.
 */
export function resultToString(
  result: Result,
  outputFormat: OutputFormat,
): string {
  if (outputFormat === "json") {
    return JSONbig.stringify(result, null, 2);
  }
  switch (result.kind) {
    case "ok":
      return [...result.theories.map(formatTheory), "No errors found"].join(
        "\n",
      );
    case "errors":
      return result.errors.map(formatError).join("\n");
    case "error":
      return `Execution failed:\n${result.error}`;
    default:
      unreachable(result);
  }
}

export function resultToExitCode(result: Result): ExitCode {
  switch (result.kind) {
    case "ok":
      return ExitCode.SUCCESS;
    case "errors":
      return ExitCode.ERRORS;
    case "error":
      return ExitCode.EXECUTION_FAILURE;
    default:
      unreachable(result);
  }
}
