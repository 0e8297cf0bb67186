import { CLIOptions, cliOptionDefaults } from "./options";
import { ErrorReport, Result, TheoryReport } from "./result";
import { OutputFormat } from "./types";
import { TheoryEnv } from "../internals/config";
import { TheoryContext } from "../internals/context";
import { PolicyError } from "../internals/datalog/errors";
import { insertEvent } from "../internals/datalog/syntaxConstructors";
import { ExecutionException, tryMsg } from "../internals/exceptions";
import {
  PolicyDocument,
  parsePolicyDocument,
} from "../internals/policyDocument";
import {
  RuleTheory,
  TheoryRegistry,
  TheoryVariant,
  createTheory,
  makeChecker,
} from "../internals/theory";
import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import JSONbig from "json-bigint";

/**
 * Loads policy documents into theories and checks them.
 */
export class Driver {
  ctx: TheoryContext;
  fs: VirtualFileSystem;
  outputFormat: OutputFormat;
  registry = new TheoryRegistry();
  /** Variant of the theories created for documents that declare none. */
  private defaultKind: TheoryVariant;
  private paths: string[];

  private constructor(paths: string[], options: CLIOptions) {
    this.fs = options.fs;
    this.ctx = new TheoryContext(options);
    this.outputFormat = options.outputFormat;
    this.defaultKind = options.kind;
    this.paths = [...new Set(paths)];
  }

  /**
   * Creates a driver with the theories declared in the configuration.
   * @param paths Paths to the policy documents to load.
   */
  public static create(
    paths: string[],
    options: Partial<CLIOptions> = {},
  ): Driver {
    const mergedOptions: CLIOptions = { ...cliOptionDefaults, ...options };
    this.checkCLIOptions(mergedOptions);
    const driver = new Driver(paths, mergedOptions);
    driver.declareTheories();
    return driver;
  }

  /**
   * Check CLI options for ambiguities.
   * @throws If the driver cannot be executed with the given options
   */
  private static checkCLIOptions(options: CLIOptions): void | never {
    if (options.verbose === true && options.quiet === true) {
      throw ExecutionException.make(
        `Please choose only one option: --verbose or --quiet`,
      );
    }
  }

  private declareTheories(): void {
    for (const declaration of this.ctx.config.theories) {
      this.registry.add(
        createTheory(declaration.kind, {
          name: declaration.name,
          abbr: declaration.abbr,
          logger: this.ctx.logger,
        }),
      );
      this.ctx.logger.debug(
        `Declared ${declaration.kind} theory ${declaration.name}`,
      );
    }
  }

  /**
   * Returns the theory a document populates, creating it on first use.
   */
  private theoryFor(doc: PolicyDocument): RuleTheory {
    const existing = this.registry.get(doc.theory);
    if (existing === undefined) {
      return this.registry.add(
        createTheory(doc.kind ?? this.defaultKind, {
          name: doc.theory,
          logger: this.ctx.logger,
        }),
      );
    }
    if (
      doc.kind !== undefined &&
      makeChecker(doc.kind).kind !== existing.kind
    ) {
      this.ctx.logger.warn(
        `${doc.file} declares ${doc.kind} kind, but theory ${doc.theory} is ${existing.kind}`,
      );
    }
    return existing;
  }

  /**
   * Loads a single document.
   * @returns Errors found in the document. The theory is left unchanged if
   *          there are any.
   */
  private loadDocument(file: string): ErrorReport[] {
    if (!this.fs.exists(file)) {
      throw ExecutionException.make(`${file} is not available`);
    }
    const text = tryMsg(
      () => this.fs.readFile(file).toString("utf8"),
      `Cannot read ${file}`,
    );
    const doc = parsePolicyDocument(text, file);
    const theory = this.theoryFor(doc);
    const errors = theory.initializeWouldCauseErrors(
      doc.tables,
      doc.facts,
      doc.rules.map(insertEvent),
    );
    if (errors.length > 0) {
      return errors.map((err) => this.errorReport(err, doc.theory, file));
    }
    theory.initializeTables(doc.tables, doc.facts);
    const changes = theory.update(doc.rules.map(insertEvent));
    this.ctx.logger.debug(
      `Loaded ${changes.length} rules and ${doc.facts.length} facts from ${file}`,
    );
    return [];
  }

  /**
   * Runs the whole-theory checks on every registered theory.
   */
  private checkTheories(): ErrorReport[] {
    const { allowRecursion, stratifyingLabels } = this.ctx.config;
    return this.registry.entries().flatMap(([name, theory]) => {
      const errors: PolicyError[] =
        allowRecursion || theory.kind === "action"
          ? []
          : theory.recursionErrors();
      errors.push(...theory.stratificationErrors(stratifyingLabels));
      return errors.map((err) => this.errorReport(err, name, undefined));
    });
  }

  private errorReport(
    err: PolicyError,
    theory: string,
    file: string | undefined,
  ): ErrorReport {
    return { file, theory, code: err.code, message: err.message };
  }

  private theoryReports(): TheoryReport[] {
    const labels = this.ctx.config.stratifyingLabels;
    return this.registry.entries().map(([name, theory]) => {
      const content = theory.content();
      const rules = theory.policy().length;
      const strata = theory.dependencyGraph.stratification(labels);
      return {
        name,
        kind: theory.kind,
        tables: theory.definedTablenames(),
        rules,
        facts: content.length - rules,
        strata: strata === undefined ? undefined : Object.fromEntries(strata),
      };
    });
  }

  /**
   * Actual implementation of the entry point.
   */
  public executeImpl(): Result {
    if (this.paths.length === 0) {
      this.ctx.logger.warn(
        "Nothing to execute. Please specify at least one policy document.",
      );
      return { kind: "ok", theories: this.theoryReports() };
    }
    try {
      const errors = this.paths.flatMap((file) => this.loadDocument(file));
      errors.push(...this.checkTheories());
      const theories = this.theoryReports();
      return errors.length === 0
        ? { kind: "ok", theories }
        : { kind: "errors", errors, theories };
    } catch (err) {
      const result: string[] = [];
      if (err instanceof Error) {
        result.push(err.message);
        if (err.stack !== undefined && TheoryEnv.POLICY_THEORY_TRACE) {
          result.push(err.stack);
        }
      } else {
        result.push(`An error occurred:\n${JSONbig.stringify(err)}`);
      }
      const error = result.join("\n");
      this.ctx.logger.error(error);
      return { kind: "error", error };
    }
  }

  /**
   * Wraps the entry point of execution with extra logging handling logic.
   */
  public execute(): Result {
    const result = this.executeImpl();
    if (this.outputFormat === "json") {
      return {
        ...result,
        logs: this.ctx.logger.getJsonLogs(),
      };
    }
    return result;
  }
}
