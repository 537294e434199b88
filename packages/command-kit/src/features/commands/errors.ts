export type DispatchErrorCode
  = | 'EMPTY_PAYLOAD'
    | 'CHANNEL_UNRESOLVED'
    | 'SEND_FAILED'

/**
 * 命令回复发送失败
 */
export class DispatchError extends Error {
  constructor(
    public readonly code: DispatchErrorCode,
    message: string,
    public readonly invocationMessageId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'DispatchError'
  }
}

/**
 * 需要回退查找（主服务器、私聊频道）但没有结果
 */
export class ResolutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResolutionError'
  }
}
