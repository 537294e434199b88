import type { Embed, EmbedField } from '../types'
import { EMBED_LIMITS } from '../types'

function checkLength(what: string, value: string, limit: number) {
  if (value.length > limit) {
    throw new RangeError(`${what} 长度 ${value.length} 超出上限 ${limit}`)
  }
}

/**
 * 结构化消息构建器
 */
export class EmbedBuilder {
  private title?: string
  private description = ''
  private readonly fields: EmbedField[] = []
  private color?: number
  private footer?: string
  private timestamp?: string

  setTitle(title: string): this {
    checkLength('title', title, EMBED_LIMITS.title)
    this.title = title
    return this
  }

  setDescription(description: string): this {
    checkLength('description', description, EMBED_LIMITS.description)
    this.description = description
    return this
  }

  appendDescription(text: string): this {
    return this.setDescription(this.description + text)
  }

  addField(name: string, value: string, inline = false): this {
    if (this.fields.length >= EMBED_LIMITS.fields) {
      throw new RangeError(`fields 数量超出上限 ${EMBED_LIMITS.fields}`)
    }
    checkLength('field name', name, EMBED_LIMITS.fieldName)
    checkLength('field value', value, EMBED_LIMITS.fieldValue)
    this.fields.push({ name, value, inline })
    return this
  }

  setColor(color: number): this {
    this.color = color
    return this
  }

  setFooter(footer: string): this {
    checkLength('footer', footer, EMBED_LIMITS.footer)
    this.footer = footer
    return this
  }

  setTimestamp(date: Date = new Date()): this {
    this.timestamp = date.toISOString()
    return this
  }

  isEmpty(): boolean {
    return isEmbedEmpty(this.build())
  }

  build(): Embed {
    const embed: Embed = { fields: this.fields.map(field => ({ ...field })) }
    if (this.title !== undefined)
      embed.title = this.title
    if (this.description)
      embed.description = this.description
    if (this.color !== undefined)
      embed.color = this.color
    if (this.footer !== undefined)
      embed.footer = this.footer
    if (this.timestamp !== undefined)
      embed.timestamp = this.timestamp
    return embed
  }
}

/**
 * 没有标题、描述和字段的 embed 视为空消息
 */
export function isEmbedEmpty(embed: Embed): boolean {
  return !embed.title?.trim() && !embed.description?.trim() && embed.fields.length === 0
}
