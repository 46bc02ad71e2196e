export { allocateRunDir, maxExistingRunId, type AllocatedRun, type AllocateOptions } from "./allocate.js";
export { RunLogger, type RunLoggerOptions } from "./run-logger.js";
