import { EmbedConvention } from './EmbedConvention'

/**
 * 常用的约定样式消息
 */
export const Embeds = {
  info: (title: string, description?: string) => new EmbedConvention('info', title, description),
  success: (title: string, description?: string) => new EmbedConvention('success', title, description),
  warn: (title: string, description?: string) => new EmbedConvention('warn', title, description),
  error: (title: string, description?: string) => new EmbedConvention('error', title, description),
}
