/**
 * Command tools
 */

export { login, loginSchema, type LoginParams, type LoginResult } from './login';
export {
  init,
  initSchema,
  resolveStarterImage,
  smartDefaultName,
  type InitParams,
  type InitResult,
} from './init';
export { run, runSchema, type RunParams, type RunResult } from './run';
export { commit, commitSchema, type CommitParams, type CommitResult } from './commit';
export { pull, pullSchema, type PullParams, type PullResult } from './pull';
export { switchEnvironment, switchSchema, type SwitchParams } from './switch';
export { listEnvironments, listSchema, type ListParams, type ListResult } from './ls';
export {
  status,
  statusSchema,
  type StatusParams,
  type StatusResult,
  type StatusState,
} from './status';
export { wrapTool, type ToolHandler, type ToolImplementation } from './tool-wrapper';
export type { ToolContext } from './types';
