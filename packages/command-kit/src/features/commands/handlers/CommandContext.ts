import type { Embed, EmbedBuilder, EmbedConvention, ResponseContent, ResponseInput, SentMessage } from '@replykit/message-kit'
import type { PermissionEvaluator } from '../services/PermissionEvaluator'
import type { ResponseTracker } from '../services/ResponseTracker'
import type {
  Actor,
  ActorProfile,
  CommandDescriptor,
  DirectoryService,
  HelpFormatter,
  Invocation,
  Membership,
  MessageTransport,
  ProfileStore,
  ResolvedChannel,
  ScopeRef,
} from '../types'
import { getLogger } from '@replykit/infra-kit'
import { isPayloadEmpty, normalizeContent, toResponseContent } from '@replykit/message-kit'
import { DispatchError, ResolutionError } from '../errors'
import { Permission, PermissionState } from '../services/Permission'
import { Arguments } from '../utils/Arguments'

const logger = getLogger('CommandContext')

/**
 * 构造命令上下文所需的长期服务
 */
export interface CommandContextDeps {
  transport: MessageTransport
  directory: DirectoryService
  profiles: ProfileStore
  formatter: HelpFormatter
  evaluator: PermissionEvaluator
  tracker: ResponseTracker
  /** 私聊命令查找成员身份用的主服务器 */
  homeScope?: ScopeRef
}

export interface ContextTargets {
  scope?: ScopeRef
  /** 回复目标频道；无法确定时为空，并带上 channelError */
  channel?: ResolvedChannel
  member?: Membership
  channelError?: ResolutionError
}

async function lookupMembership(
  directory: DirectoryService,
  actorId: string,
  scope: ScopeRef,
): Promise<Membership | undefined> {
  let member: Membership | undefined
  try {
    member = await directory.resolveMembership(actorId, scope)
  }
  catch (error) {
    logger.warn(`Membership lookup failed for actorId: ${actorId} scopeId: ${scope.id}`, error)
    return undefined
  }
  if (!member) {
    logger.debug(`Actor ${actorId} has no membership in scope ${scope.id}`)
  }
  return member
}

/**
 * 一次性解析回复频道、所属服务器和成员身份
 *
 * 服务器内的命令使用消息自带的信息；私聊或无法识别服务器时回退到主服务器。
 * 成员查找为空或失败只会降级为"无权限"；服务器查找抛出的异常原样向上传递
 */
export async function resolveContextTargets(
  directory: DirectoryService,
  invocation: Invocation,
  homeScope?: ScopeRef,
): Promise<ContextTargets> {
  const { channel, actor } = invocation

  if (channel.type === 'scope') {
    const scope = await directory.resolveScope(channel)
    if (scope) {
      const member = invocation.membership ?? await lookupMembership(directory, actor.id, scope)
      return { scope, channel: { ...channel, scopeId: scope.id }, member }
    }
    logger.warn(`Channel ${channel.id} could not be resolved to a scope, falling back to home scope`)
  }

  let member: Membership | undefined
  if (homeScope) {
    member = await lookupMembership(directory, actor.id, homeScope)
  }

  if (channel.type === 'private') {
    return { scope: homeScope, channel: { ...channel }, member }
  }
  return {
    scope: homeScope,
    member,
    channelError: new ResolutionError(`频道 ${channel.id} 无法确定所属服务器`),
  }
}

/**
 * 命令执行上下文
 *
 * 每次调用一个实例：负责发送回复（并登记到 ResponseTracker）以及权限判断
 */
export class CommandContext {
  private constructor(
    private readonly deps: CommandContextDeps,
    public readonly invocation: Invocation,
    public readonly command: CommandDescriptor,
    public readonly args: Arguments,
    public readonly profile: ActorProfile,
    private readonly targets: ContextTargets,
  ) { }

  static async create(
    deps: CommandContextDeps,
    invocation: Invocation,
    command: CommandDescriptor,
    args: Arguments = new Arguments(),
    profile?: ActorProfile,
  ): Promise<CommandContext> {
    const [resolvedProfile, targets] = await Promise.all([
      profile ?? deps.profiles.getProfile(invocation.actor.id),
      resolveContextTargets(deps.directory, invocation, deps.homeScope),
    ])
    return new CommandContext(deps, invocation, command, args, resolvedProfile, targets)
  }

  get messageId(): string {
    return this.invocation.messageId
  }

  get author(): Actor {
    return this.invocation.actor
  }

  get isPrivate(): boolean {
    return this.invocation.channel.type === 'private'
  }

  get scope(): ScopeRef | undefined {
    return this.targets.scope
  }

  get channel(): ResolvedChannel | undefined {
    return this.targets.channel
  }

  get member(): Membership | undefined {
    return this.targets.member
  }

  /**
   * 发送纯文本，@everyone / @here 不会生效
   */
  respond(content: string): Promise<SentMessage>
  /**
   * 发送已构建的 embed
   */
  respond(embed: Embed): Promise<SentMessage>
  /**
   * 发送构建器当前的内容
   */
  respond(builder: EmbedBuilder): Promise<SentMessage>
  /**
   * 按项目约定的样式发送 embed
   */
  respond(convention: EmbedConvention): Promise<SentMessage>
  respond(input: ResponseInput): Promise<SentMessage>
  respond(input: ResponseInput): Promise<SentMessage> {
    return this.dispatch(toResponseContent(input))
  }

  respondText(content: string): Promise<SentMessage> {
    return this.dispatch({ kind: 'text', text: content })
  }

  respondEmbed(embed: Embed | EmbedBuilder | EmbedConvention): Promise<SentMessage> {
    return this.dispatch(toResponseContent(embed))
  }

  /**
   * 发送当前命令的帮助，渲染失败同样通过返回的 Promise 抛出
   */
  async sendHelp(): Promise<SentMessage> {
    return this.respond(this.deps.formatter.renderHelp(this.command))
  }

  hasPermission(permission: Permission): boolean {
    return this.deps.evaluator.evaluate(permission, this.targets.member, this.profile) === PermissionState.ACCEPTED
  }

  hasAdmin(): boolean {
    return this.hasPermission(Permission.ADMIN)
  }

  hasModerator(): boolean {
    return this.hasPermission(Permission.MODERATOR)
  }

  // 传输层调用在第一个 await 之前发出，同一上下文的回复按调用顺序交给传输层
  private async dispatch(content: ResponseContent): Promise<SentMessage> {
    const invocationId = this.invocation.messageId
    const payload = normalizeContent(content)
    if (isPayloadEmpty(payload)) {
      throw new DispatchError('EMPTY_PAYLOAD', '回复内容不能为空', invocationId)
    }

    const channel = this.targets.channel
    if (!channel) {
      throw new DispatchError(
        'CHANNEL_UNRESOLVED',
        `无法确定命令 ${invocationId} 的回复频道`,
        invocationId,
        { cause: this.targets.channelError },
      )
    }

    let sent: SentMessage
    try {
      sent = await this.deps.transport.sendToChannel(channel, payload)
    }
    catch (error) {
      logger.warn(`[Respond] Failed to send reply for invocation: ${invocationId} channelId: ${channel.id}`, error)
      throw new DispatchError('SEND_FAILED', `回复发送失败: ${channel.id}`, invocationId, { cause: error })
    }

    this.deps.tracker.register(invocationId, sent.channelId, sent.messageId)
    return sent
  }
}
