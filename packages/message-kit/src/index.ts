/**
 * 出站消息模块导出
 */

export * from './types'
export * from './payload'
export { EmbedBuilder, isEmbedEmpty } from './embed/EmbedBuilder'
export { CONVENTION_STYLE, EmbedConvention, type EmbedConventionType } from './embed/EmbedConvention'
export { Embeds } from './embed/Embeds'
