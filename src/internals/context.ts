import { TheoryConfig, TheoryEnv } from "./config";
import { DebugLogger, Logger, QuietLogger, TraceLogger } from "./logger";
import { CLIOptions, cliOptionDefaults } from "../cli/options";
import { throwZodError } from "./exceptions";

/**
 * Represents the context of a run: configuration and the logger to use.
 */
export class TheoryContext {
  public logger: Logger;
  public config: TheoryConfig;

  /**
   * Initializes the context, setting up configuration and appropriate logger.
   */
  constructor(options: CLIOptions = cliOptionDefaults) {
    try {
      this.config = new TheoryConfig({
        configPath: options.config,
        fs: options.fs,
      });
    } catch (err) {
      throwZodError(err, {
        msg: `Error parsing configuration${options.config ? " " + options.config : ""}`,
      });
    }

    // Prioritize CLI options to configuration file values
    if (options.labels !== undefined) {
      this.config.stratifyingLabels = options.labels;
    }
    if (options.allowRecursion) {
      this.config.allowRecursion = true;
    }

    // Set logger based on verbosity options
    const saveJson = options.outputFormat === "json";
    if (TheoryEnv.POLICY_THEORY_TRACE) {
      this.logger = new TraceLogger(saveJson);
    } else {
      this.logger = options.verbose
        ? new DebugLogger(saveJson, true)
        : options.quiet
          ? new QuietLogger(saveJson)
          : this.config.verbosity === "quiet"
            ? new QuietLogger(saveJson)
            : this.config.verbosity === "debug"
              ? new DebugLogger(saveJson)
              : new Logger(undefined, saveJson);
    }
  }
}
