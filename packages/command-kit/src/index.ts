export { CommandClient, type CommandClientOptions, type ExecutionResult } from './features/commands/CommandClient'
export { DispatchError, type DispatchErrorCode, ResolutionError } from './features/commands/errors'
export {
  CommandContext,
  type CommandContextDeps,
  type ContextTargets,
  resolveContextTargets,
} from './features/commands/handlers/CommandContext'
export { EmbedHelpFormatter } from './features/commands/services/HelpFormatter'
export { Permission, PERMISSION_LABELS, PermissionState } from './features/commands/services/Permission'
export { PermissionEvaluator, type PermissionEvaluatorOptions } from './features/commands/services/PermissionEvaluator'
export { type ResponseRecord, ResponseTracker } from './features/commands/services/ResponseTracker'
export type * from './features/commands/types'
export { Arguments } from './features/commands/utils/Arguments'
