import type { Embed } from '../types'
import { EmbedBuilder } from './EmbedBuilder'

export type EmbedConventionType = 'info' | 'success' | 'warn' | 'error'

export const CONVENTION_STYLE: Record<EmbedConventionType, { icon: string, color: number }> = {
  info: { icon: 'ℹ️', color: 0x3498DB },
  success: { icon: '✅', color: 0x2ECC71 },
  warn: { icon: '⚠️', color: 0xF1C40F },
  error: { icon: '❌', color: 0xE74C3C },
}

/**
 * 项目约定样式的 embed：按类型决定图标和颜色
 */
export class EmbedConvention {
  private readonly builder = new EmbedBuilder()

  constructor(
    public readonly type: EmbedConventionType,
    public readonly title: string,
    description?: string,
  ) {
    const style = CONVENTION_STYLE[type]
    this.builder.setTitle(`${style.icon} ${title}`).setColor(style.color)
    if (description)
      this.builder.setDescription(description)
  }

  description(text: string): this {
    this.builder.setDescription(text)
    return this
  }

  field(name: string, value: string, inline = false): this {
    this.builder.addField(name, value, inline)
    return this
  }

  footer(text: string): this {
    this.builder.setFooter(text)
    return this
  }

  toEmbed(): Embed {
    return this.builder.build()
  }
}
