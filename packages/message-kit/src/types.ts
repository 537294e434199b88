/**
 * 出站消息类型定义
 *
 * 命令回复最终都会归一为 OutgoingPayload，交给传输层发送
 */

export interface EmbedField {
  name: string
  value: string
  inline: boolean
}

/**
 * 结构化消息（embed）
 */
export interface Embed {
  title?: string
  description?: string
  fields: EmbedField[]
  color?: number
  footer?: string
  /** ISO 8601 */
  timestamp?: string
}

export type MentionType = 'everyone' | 'here' | 'users' | 'roles'

export interface AllowedMentions {
  /** 发送时不展开的提及类型 */
  deny: MentionType[]
}

export interface TextPayload {
  type: 'text'
  content: string
  allowedMentions: AllowedMentions
}

export interface EmbedPayload {
  type: 'embed'
  embed: Embed
}

export type OutgoingPayload = TextPayload | EmbedPayload

/**
 * 已发送消息的句柄
 */
export interface SentMessage {
  channelId: string
  messageId: string
}

export const EMBED_LIMITS = {
  title: 256,
  description: 4096,
  fieldName: 256,
  fieldValue: 1024,
  fields: 25,
  footer: 2048,
} as const
