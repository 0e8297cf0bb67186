import { ExecutionException } from "./exceptions";
import { NEGATION_LABEL } from "./datalog/dependencyGraph";
import { TheoryVariant } from "./theory/checks";
import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import { z } from "zod";

const TheoryVariantSchema = z.enum(["nonrecursive", "action", "unsafe"]);

const TheoryDeclarationSchema = z.object({
  name: z.string().min(1),
  kind: TheoryVariantSchema.optional().default("nonrecursive"),
  abbr: z.string().optional(),
});

const VerbositySchema = z.enum(["quiet", "debug", "default"]);

const ConfigSchema = z.object({
  stratifyingLabels: z.array(z.string()).optional().default([NEGATION_LABEL]),
  verbosity: VerbositySchema.optional().default("default"),
  theories: z.array(TheoryDeclarationSchema).optional().default([]),
  allowRecursion: z.boolean().optional().default(false),
});

export type TheoryDeclaration = {
  name: string;
  kind: TheoryVariant;
  abbr?: string;
};

export type Verbosity = z.infer<typeof VerbositySchema>;

/**
 * Represents content of the configuration file (policy.config.json).
 */
export class TheoryConfig {
  /** Edge labels that require a strictly higher stratum. */
  public stratifyingLabels: string[];
  public verbosity: Verbosity;
  /** Theories created before any policy document is loaded. */
  public theories: TheoryDeclaration[];
  /** Accept cycles in nonrecursive theories. */
  public allowRecursion: boolean;

  /**
   * @throws ZodError if the configuration has a wrong shape.
   */
  constructor({
    configPath = undefined,
    fs = undefined,
  }: Partial<{
    configPath: string;
    fs: VirtualFileSystem;
  }> = {}) {
    let configData: unknown = {};
    if (configPath !== undefined) {
      if (fs === undefined) {
        throw ExecutionException.make(
          `Cannot read ${configPath}: no file system provided`,
        );
      }
      try {
        const configFileContents = fs.readFile(configPath).toString("utf8");
        configData = JSON.parse(configFileContents);
      } catch (err) {
        if (err instanceof Error) {
          throw ExecutionException.make(
            `Could not load or parse config file (${configPath}): ${err.message}`,
          );
        } else {
          throw err;
        }
      }
    }
    const parsedConfig = ConfigSchema.parse(configData);
    this.stratifyingLabels = parsedConfig.stratifyingLabels;
    this.verbosity = parsedConfig.verbosity;
    this.theories = parsedConfig.theories;
    this.allowRecursion = parsedConfig.allowRecursion;
  }
}

/**
 * Environment variables to configure advanced options.
 */
export class TheoryEnv {
  /**
   * Whether to trace the execution.
   */
  public static POLICY_THEORY_TRACE: boolean = process.env.POLICY_THEORY_TRACE
    ? process.env.POLICY_THEORY_TRACE === "1"
    : false;
}
