import { THEORY_VERSION } from "../version";
import JSONbig from "json-bigint";
import { ZodError } from "zod";

const SEPARATOR =
  "============================================================";

/**
 * Attempts to stringify the input, falling back to `String` if it fails.
 */
function stringifyNode(input: unknown): string {
  try {
    return JSONbig.stringify(input, null, 2);
  } catch (jsonError) {
    return `[Unable to stringify object: ${jsonError}]`;
  }
}

/**
 * Internal error, typically caused by a bug in policy-theory or incorrect API usage.
 */
export class InternalException {
  private constructor() {}
  static make(
    msg: string,
    {
      node = undefined,
    }: Partial<{
      node: unknown;
    }> = {},
  ): Error {
    const errorKind = "Internal Error:";
    const parts = [
      errorKind,
      msg,
      ...(node === undefined ? [] : [SEPARATOR, stringifyNode(node)]),
      getVersions(),
    ];
    return new Error(parts.join("\n"));
  }
}

/**
 * An error caused by incorrect actions of the user, such as wrong configuration,
 * unreadable policy documents, wrong CLI options.
 */
export class ExecutionException {
  private constructor() {}
  static make(
    msg: string,
    {
      file = undefined,
    }: Partial<{
      file: string;
    }> = {},
  ): Error {
    const fileStr = file === undefined ? "" : ` in ${file}`;
    const errorKind = `Execution Error${fileStr}:`;
    return new Error([errorKind, msg].join("\n"));
  }
}

function getVersions(): string {
  return `Using policy-theory ${THEORY_VERSION}`;
}

/**
 * Wraps the `try` clause adding an extra context to the exception text.
 */
export function tryMsg<T>(callback: () => T, message: string): T {
  try {
    return callback();
  } catch (err) {
    if (!(err instanceof Error)) {
      throw err;
    }
    throw new Error(`${message}: ${err.message}`);
  }
}

/**
 * Throws an ExecutionException with a human-readable ZodError message.
 * @param err The ZodError to throw.
 */
export function throwZodError(
  err: unknown,
  {
    msg = undefined,
    help = undefined,
  }: Partial<{ msg: string; help: string }> = {},
): never {
  if (err instanceof ZodError) {
    const formattedErrors = err.errors
      .map((e) => {
        const path = e.path.length ? e.path.join(" > ") : "root";
        return `- ${e.message} at ${path}`;
      })
      .join("\n");
    throw ExecutionException.make(
      `${msg ? msg + "\n" : ""}${formattedErrors}${help ? "\n\n" + help : ""}`,
    );
  } else {
    throw err;
  }
}
