import type { CommandContextDeps } from './handlers/CommandContext'
import type { Command, CommandDescriptor, DirectoryService, HelpFormatter, Invocation, MessageTransport, ProfileStore, ScopeRef } from './types'
import { env, getLogger } from '@replykit/infra-kit'
import { Embeds } from '@replykit/message-kit'
import { CommandContext } from './handlers/CommandContext'
import { EmbedHelpFormatter } from './services/HelpFormatter'
import { PERMISSION_LABELS } from './services/Permission'
import { PermissionEvaluator } from './services/PermissionEvaluator'
import { ResponseTracker } from './services/ResponseTracker'
import { Arguments } from './utils/Arguments'

const logger = getLogger('CommandClient')

export interface CommandClientOptions {
  transport: MessageTransport
  directory: DirectoryService
  profiles: ProfileStore
  formatter?: HelpFormatter
  evaluator?: PermissionEvaluator
  tracker?: ResponseTracker
  /** 默认取 HOME_SCOPE_ID */
  homeScope?: ScopeRef
}

export type ExecutionResult = 'executed' | 'rejected'

/**
 * 命令客户端：整个服务一个实例，持有回复记录并为每次调用创建上下文
 */
export class CommandClient {
  readonly tracker: ResponseTracker
  readonly evaluator: PermissionEvaluator
  private readonly deps: CommandContextDeps

  constructor(options: CommandClientOptions) {
    this.tracker = options.tracker ?? new ResponseTracker()
    this.evaluator = options.evaluator ?? PermissionEvaluator.fromEnv()
    const homeScope = options.homeScope ?? (env.HOME_SCOPE_ID ? { id: env.HOME_SCOPE_ID } : undefined)
    if (!homeScope) {
      logger.warn('HOME_SCOPE_ID 未配置，私聊命令将按无权限处理')
    }
    this.deps = {
      transport: options.transport,
      directory: options.directory,
      profiles: options.profiles,
      formatter: options.formatter ?? new EmbedHelpFormatter(),
      evaluator: this.evaluator,
      tracker: this.tracker,
      homeScope,
    }
  }

  createContext(invocation: Invocation, command: CommandDescriptor, args: Arguments = new Arguments()): Promise<CommandContext> {
    return CommandContext.create(this.deps, invocation, command, args)
  }

  /**
   * 执行已匹配的命令；权限不足时回复提示并返回 rejected
   */
  async execute(invocation: Invocation, command: Command, args: Arguments = new Arguments()): Promise<ExecutionResult> {
    const ctx = await this.createContext(invocation, command, args)

    if (!ctx.hasPermission(command.permission)) {
      logger.info(`[Permission] Rejected ${command.name} for actorId: ${invocation.actor.id}`)
      await ctx.respond(Embeds.error('权限不足', `该命令需要「${PERMISSION_LABELS[command.permission]}」权限`))
      return 'rejected'
    }

    try {
      await command.execute(ctx)
    }
    catch (error) {
      logger.error(`[Commands] ${command.name} failed for invocation: ${invocation.messageId}`, error)
      throw error
    }
    logger.debug(`[Commands] ${command.name} executed`)
    return 'executed'
  }

  /**
   * 命令消息被删除时，删除为其发出的全部回复
   */
  async handleInvocationDeleted(invocationMessageId: string): Promise<number> {
    const records = this.tracker.release(invocationMessageId)
    if (records.length === 0)
      return 0

    const results = await Promise.allSettled(
      records.map(record => this.deps.transport.deleteMessage(record.channelId, record.messageId)),
    )
    const errors = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []))
    if (errors.length > 0) {
      logger.warn(`Failed to delete ${errors.length}/${records.length} responses for invocation: ${invocationMessageId}`)
      throw new AggregateError(errors, `删除命令 ${invocationMessageId} 的回复失败`)
    }
    logger.debug(`Deleted ${records.length} responses for invocation: ${invocationMessageId}`)
    return records.length
  }
}
