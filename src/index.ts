export {
  parseConfigRows,
  parseConfigText,
  readConfigFile,
  makeHolding,
  toHolding,
  splitRows,
  assertRowCounts,
  formatHolding,
  MODES,
  type Mode,
  type Direction,
  type ConfigRow,
  type Holding,
  type LineRange,
} from "./config.js";

export {
  resolveFolderRange,
  resolveLineRange,
  assertDisjoint,
  sortEntries,
  type Content,
} from "./range.js";

export {
  createProbe,
  SshProbe,
  LocalProbe,
  type ContentProbe,
} from "./probe.js";

export { planBroadcast } from "./broadcast.js";
export { planScatter } from "./scatter.js";
export { planGather } from "./gather.js";
export { compilePlan, type CompileOptions } from "./compile.js";

export {
  formatPlanTable,
  assertPlanConsistent,
  type Plan,
  type Round,
  type TransferEdge,
  type Selection,
} from "./plan.js";

export {
  executePlan,
  type Transport,
  type ExecuteOptions,
  type ExecutionProgress,
  type ExecutionSummary,
} from "./executor.js";

export { RsyncTransport, buildCopyCommand, type CopyCommand } from "./transfer.js";
export { distribute, loadPlan, type DistributeOptions } from "./distribute.js";

export {
  FancopyError,
  ConfigError,
  ResolutionError,
  TransferError,
  type EdgeFailure,
} from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
