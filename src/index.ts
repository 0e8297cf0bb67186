export * from "./internals/datalog";
export * from "./internals/graph";
export * from "./internals/theory";
export { OrderedSet } from "./internals/orderedSet";
export {
  Logger,
  LogLevel,
  QuietLogger,
  DebugLogger,
  TraceLogger,
} from "./internals/logger";
export { InternalException, ExecutionException } from "./internals/exceptions";
export { TheoryConfig, TheoryEnv } from "./internals/config";
export {
  PolicyDocument,
  parsePolicyDocument,
} from "./internals/policyDocument";
export { createVirtualFileSystem } from "./vfs/createVirtualFileSystem";
export { createNodeFileSystem } from "./vfs/createNodeFileSystem";
export {
  VirtualFileSystem,
  FileSystemTree,
} from "./vfs/virtualFileSystem";
export * from "./cli";
export { THEORY_VERSION } from "./version";
