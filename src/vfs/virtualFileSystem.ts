type FileNode = {
  type: "file";
  content: string;
};

export type FileSystemTree = Record<string, FileNode>;

type FileSystemBackend = "local" | "inMemory";

/**
 * Read access to policy documents and configuration files.
 */
export type VirtualFileSystem = {
  root: string;
  type: FileSystemBackend;
  resolve(...path: string[]): string;
  exists(path: string): boolean;
  readFile(path: string): Buffer;
};
