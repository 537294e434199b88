import type { OutgoingPayload, ResponseInput, SentMessage } from '@replykit/message-kit'
import type { CommandContext } from './handlers/CommandContext'
import type { Permission } from './services/Permission'

export interface ChannelRef {
  id: string
  /** scope: 服务器内频道；private: 私聊 */
  type: 'scope' | 'private'
}

/**
 * 解析后的频道；服务器频道会带上所属 scopeId
 */
export interface ResolvedChannel extends ChannelRef {
  scopeId?: string
}

export interface ScopeRef {
  id: string
  name?: string
}

export interface Actor {
  id: string
  name: string
}

/**
 * 用户在某个服务器中的成员身份
 */
export interface Membership {
  actorId: string
  scopeId: string
  roleIds: string[]
}

/**
 * 持久化的用户设置（只读）
 */
export interface ActorProfile {
  actorId: string
  /** 显式授予的权限等级，与角色无关 */
  permissionOverride?: Permission
  blacklisted?: boolean
}

/**
 * 一次命令调用
 */
export interface Invocation {
  readonly messageId: string
  readonly channel: ChannelRef
  readonly actor: Actor
  /** 服务器消息自带的成员信息 */
  readonly membership?: Membership
}

export interface CommandDescriptor {
  name: string
  aliases?: string[]
  description: string
  usage?: string
  permission: Permission
  category?: string
}

export interface Command extends CommandDescriptor {
  execute: (ctx: CommandContext) => Promise<void>
}

export interface MessageTransport {
  sendToChannel: (channel: ResolvedChannel, payload: OutgoingPayload) => Promise<SentMessage>
  deleteMessage: (channelId: string, messageId: string) => Promise<void>
}

export interface DirectoryService {
  resolveScope: (channel: ChannelRef) => Promise<ScopeRef | undefined>
  resolveMembership: (actorId: string, scope: ScopeRef) => Promise<Membership | undefined>
}

export interface ProfileStore {
  getProfile: (actorId: string) => Promise<ActorProfile>
}

export interface HelpFormatter {
  renderHelp: (command: CommandDescriptor) => ResponseInput
}
