export {
  addPresetToConfig,
  getPreset,
  listPresetNames,
  loadConfig,
  loadProjectConfig,
  mergeConfigs,
  removePresetFromConfig,
  saveConfig,
} from './core/config.js';
export {
  CrossDeviceError,
  PlanBuildError,
  type PlanBuildErrorCode,
  PlanNotExecutableError,
  RenameExecutionError,
  RnmError,
  TransformError,
  type TransformErrorCode,
} from './core/errors.js';
export { type ExecuteOptions, executePlan } from './core/executor.js';
export { type FileStat, nodeRenameFs, type RenameFs } from './core/fs-utils.js';
export {
  type BuildOutcome,
  buildPlan,
  isExecutable,
  type PlanOptions,
  planRename,
  previewPairs,
} from './core/planner.js';
export { type ResolveOptions, resolvePlan } from './core/resolver.js';
export { type SelectOptions, selectFiles } from './core/selection.js';
export {
  applyTransform,
  type CompiledTransform,
  compileTransform,
  describeTransform,
} from './core/transform.js';
export type {
  Config,
  Conflict,
  ConflictKind,
  ExecutionErrorCode,
  ExecutionEvent,
  ExecutionResult,
  OpFailure,
  Plan,
  Preset,
  RenameOp,
  RenameStage,
  TransformContext,
  TransformMode,
  TransformSpec,
} from './types.js';
export { TransformSpecSchema } from './types.js';
