import { getLogger } from '@replykit/infra-kit'

const logger = getLogger('ResponseTracker')

export interface ResponseRecord {
  invocationMessageId: string
  channelId: string
  messageId: string
  createdAt: number
}

/**
 * 记录每条命令消息对应发出的回复
 *
 * 整个服务共享一个实例；只追加，按命令消息 ID 分组
 */
export class ResponseTracker {
  private readonly records = new Map<string, ResponseRecord[]>()
  private total = 0

  register(invocationMessageId: string, channelId: string, messageId: string): ResponseRecord {
    const record: ResponseRecord = {
      invocationMessageId,
      channelId,
      messageId,
      createdAt: Date.now(),
    }
    const list = this.records.get(invocationMessageId)
    if (list) {
      list.push(record)
    }
    else {
      this.records.set(invocationMessageId, [record])
    }
    this.total++
    logger.trace(`Registered response invocation: ${invocationMessageId} channelId: ${channelId} messageId: ${messageId}`)
    return record
  }

  getResponses(invocationMessageId: string): readonly ResponseRecord[] {
    return [...(this.records.get(invocationMessageId) ?? [])]
  }

  has(invocationMessageId: string): boolean {
    return this.records.has(invocationMessageId)
  }

  /**
   * 取出并移除某条命令的全部回复记录
   */
  release(invocationMessageId: string): ResponseRecord[] {
    const list = this.records.get(invocationMessageId) ?? []
    this.records.delete(invocationMessageId)
    this.total -= list.length
    return list
  }

  get size(): number {
    return this.total
  }
}
