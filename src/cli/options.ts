import { OutputFormat } from "./types";
import { TheoryVariant } from "../internals/theory/checks";
import { splitList } from "../internals/util";
import { createNodeFileSystem } from "../vfs/createNodeFileSystem";
import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import { Option } from "commander";

export interface CLIOptions {
  config?: string;
  outputFormat: OutputFormat;
  /** Stratifying edge labels; overrides the configuration file. */
  labels?: string[];
  /** Variant of the theories created for documents that declare none. */
  kind: TheoryVariant;
  allowRecursion: boolean;
  verbose: boolean;
  quiet: boolean;
  fs: VirtualFileSystem;
}

export const cliOptionDefaults: CLIOptions = {
  config: undefined,
  outputFormat: "plain",
  labels: undefined,
  kind: "nonrecursive",
  allowRecursion: false,
  verbose: false,
  quiet: false,
  fs: createNodeFileSystem(process.cwd()),
};

export const cliOptions = [
  new Option("--config <PATH>", "Path to the configuration file."),
  new Option("--output-format <format>", "Set the output format.")
    .choices(["plain", "json"])
    .default(cliOptionDefaults.outputFormat),
  new Option(
    "--labels <labels>",
    "A comma-separated list of edge labels that require a higher stratum.",
  )
    .argParser((value) => {
      const labels = splitList(value);
      if (labels.length === 0) {
        throw new Error("The --labels option requires a non-empty list.");
      }
      return labels;
    })
    .default(undefined),
  new Option(
    "--kind <kind>",
    "Theory kind for documents that do not declare one.",
  )
    .choices(["nonrecursive", "action", "unsafe"])
    .default(cliOptionDefaults.kind),
  new Option(
    "--allow-recursion",
    "Do not report recursive rules in nonrecursive theories.",
  ).default(false),
  new Option("--verbose", "Enable verbose output.").default(false),
  new Option("--quiet", "Suppress output.").default(false),
];
