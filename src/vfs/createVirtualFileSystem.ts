import { FileSystemTree, VirtualFileSystem } from "./virtualFileSystem";
import { ExecutionException } from "../internals/exceptions";
import path from "path";

/**
 * Creates an in-memory file system.
 *
 * @param root - The directory relative paths are resolved against.
 * @param fileSystemTree - Files keyed by their absolute paths.
 */
export function createVirtualFileSystem(
  root: string,
  fileSystemTree: FileSystemTree = {},
): VirtualFileSystem {
  let normalizedRoot = path.normalize(root);
  if (!normalizedRoot.endsWith(path.sep)) {
    normalizedRoot += path.sep;
  }

  const memoryFS = fileSystemTree;

  return {
    root: normalizedRoot,
    type: "inMemory",

    exists(filePath: string): boolean {
      return this.resolve(filePath) in memoryFS;
    },

    resolve(...filePath: string[]): string {
      return path.normalize(path.resolve(normalizedRoot, ...filePath));
    },

    /**
     * @throws An error if the file does not exist.
     */
    readFile(filePath: string): Buffer {
      const resolvedPath = this.resolve(filePath);
      const file = memoryFS[resolvedPath];
      if (file === undefined) {
        throw ExecutionException.make(`File '${resolvedPath}' does not exist`);
      }
      return Buffer.from(file.content, "utf-8");
    },
  };
}
