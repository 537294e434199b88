import type { Embed, OutgoingPayload } from './types'
import { EmbedBuilder, isEmbedEmpty } from './embed/EmbedBuilder'
import { EmbedConvention } from './embed/EmbedConvention'

/**
 * 命令回复允许的四种输入形态
 */
export type ResponseInput = string | Embed | EmbedBuilder | EmbedConvention

export type ResponseContent
  = | { kind: 'text', text: string }
    | { kind: 'embed', embed: Embed }
    | { kind: 'embedBuilder', builder: EmbedBuilder }
    | { kind: 'convention', convention: EmbedConvention }

export function toResponseContent(input: ResponseInput): ResponseContent {
  if (typeof input === 'string')
    return { kind: 'text', text: input }
  if (input instanceof EmbedConvention)
    return { kind: 'convention', convention: input }
  if (input instanceof EmbedBuilder)
    return { kind: 'embedBuilder', builder: input }
  return { kind: 'embed', embed: input }
}

/**
 * 归一为传输层载荷；纯文本默认禁止 @everyone / @here
 */
export function normalizeContent(content: ResponseContent): OutgoingPayload {
  switch (content.kind) {
    case 'text':
      return {
        type: 'text',
        content: content.text,
        allowedMentions: { deny: ['everyone', 'here'] },
      }
    case 'embed':
      return { type: 'embed', embed: content.embed }
    case 'embedBuilder':
      return { type: 'embed', embed: content.builder.build() }
    case 'convention':
      return { type: 'embed', embed: content.convention.toEmbed() }
  }
}

export function isPayloadEmpty(payload: OutgoingPayload): boolean {
  return payload.type === 'text'
    ? payload.content.trim().length === 0
    : isEmbedEmpty(payload.embed)
}
