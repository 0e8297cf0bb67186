import { Driver } from "./driver";
import { cliOptions } from "./options";
import { Result, resultToString } from "./result";
import { unreachable } from "../internals/util";
import { THEORY_VERSION } from "../version";
import { createNodeFileSystem } from "../vfs/createNodeFileSystem";
import { Command } from "commander";

/**
 * Creates and configures the policy-theory CLI command.
 * @returns The configured commander Command instance.
 */
export function createTheoryCommand(): Command {
  const command = new Command()
    .name("policy-theory")
    .description("Datalog policy theory checker")
    .version(THEORY_VERSION)
    .arguments("[paths...]");
  cliOptions.forEach((option) => command.addOption(option));
  return command;
}

/**
 * Runs the policy-theory CLI command with the provided arguments.
 *
 * Note: This function throws execution exceptions when the driver cannot be
 * created. Handle exceptions appropriately when calling this function.
 *
 * @param args The list of arguments to pass to the CLI command.
 * @param command Optional pre-configured Command instance. Defaults to createTheoryCommand().
 * @returns The created Driver instance and the result of execution.
 */
export async function runTheoryCommand(
  args: string[],
  command: Command = createTheoryCommand(),
): Promise<[Driver, Result]> {
  await command.parseAsync(args, { from: "user" });
  const driver = Driver.create(command.args, {
    ...command.opts(),
    fs: createNodeFileSystem(process.cwd()),
  });
  const result = driver.execute();
  return [driver, result];
}

/**
 * Executes the checker capturing the output and returning it as a string.
 * @param args The list of arguments to pass to the CLI command.
 * @returns The output of the command as a string.
 */
export async function executeTheory(args: string[]): Promise<string> {
  const [driver, result] = await runTheoryCommand(args);
  return resultToString(result, driver.outputFormat);
}

/**
 * Prints the result to the console.
 */
export function handleTheoryResult(driver: Driver, result: Result): void {
  const logger = driver.ctx.logger;
  const text = resultToString(result, driver.outputFormat);
  const print = driver.outputFormat === "json";
  switch (result.kind) {
    case "errors":
      print ? console.warn(text) : logger.warn(text);
      break;
    case "error":
      print ? console.error(text) : logger.error(text);
      break;
    case "ok":
      print ? console.log(text) : logger.info(text);
      break;
    default:
      unreachable(result);
  }
}
