import { VirtualFileSystem } from "./virtualFileSystem";
import fs from "fs";
import path from "path";

/**
 * Creates a Virtual File System backed by the local file system.
 *
 * @param root - The directory relative paths are resolved against.
 */
export function createNodeFileSystem(root: string): VirtualFileSystem {
  let normalizedRoot = path.normalize(root);
  if (!normalizedRoot.endsWith(path.sep)) {
    normalizedRoot += path.sep;
  }

  return {
    root: normalizedRoot,
    type: "local",

    exists(filePath: string): boolean {
      return fs.existsSync(this.resolve(filePath));
    },

    resolve(...filePath: string[]): string {
      return path.normalize(path.resolve(normalizedRoot, ...filePath));
    },

    readFile(filePath: string): Buffer {
      return fs.readFileSync(this.resolve(filePath));
    },
  };
}
