export { Driver } from "./driver";
export * from "./result";
export * from "./types";
export { CLIOptions, cliOptions, cliOptionDefaults } from "./options";
export {
  createTheoryCommand,
  runTheoryCommand,
  executeTheory,
  handleTheoryResult,
} from "./cli";
