import type { EmbedConvention } from '@replykit/message-kit'
import type { CommandDescriptor, HelpFormatter } from '../types'
import { env } from '@replykit/infra-kit'
import { Embeds } from '@replykit/message-kit'
import { PERMISSION_LABELS } from './Permission'

/**
 * 以 info embed 渲染单条命令的帮助
 */
export class EmbedHelpFormatter implements HelpFormatter {
  constructor(private readonly prefix: string = env.COMMAND_PREFIX) { }

  renderHelp(command: CommandDescriptor): EmbedConvention {
    const invocation = `${this.prefix}${command.name}`
    const embed = Embeds.info(`命令帮助: ${invocation}`, command.description)
      .field('用法', command.usage ? `${invocation} ${command.usage}` : invocation)

    if (command.aliases && command.aliases.length > 0) {
      embed.field('别名', command.aliases.map(alias => `${this.prefix}${alias}`).join(', '), true)
    }
    embed.field('权限', PERMISSION_LABELS[command.permission], true)
    if (command.category) {
      embed.field('分类', command.category, true)
    }
    return embed
  }
}
