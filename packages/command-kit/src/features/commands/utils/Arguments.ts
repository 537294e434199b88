/**
 * 已解析的命令参数（只做访问，不做语法解析）
 */
export class Arguments {
  private readonly list: readonly string[]

  constructor(list: readonly string[] = []) {
    this.list = [...list]
  }

  static fromRaw(raw: string): Arguments {
    return new Arguments(raw.split(/\s+/).filter(arg => arg.length > 0))
  }

  get size(): number {
    return this.list.length
  }

  isEmpty(): boolean {
    return this.list.length === 0
  }

  get(index: number): string {
    const value = this.list[index]
    if (value === undefined) {
      throw new RangeError(`缺少第 ${index + 1} 个参数`)
    }
    return value
  }

  optional(index: number): string | undefined {
    return this.list[index]
  }

  /**
   * 从 from 开始用空格拼接剩余参数
   */
  join(from = 0): string {
    return this.list.slice(from).join(' ')
  }

  toArray(): string[] {
    return [...this.list]
  }
}
