import path from 'node:path'
import process from 'node:process'
import z from 'zod'

const emptyStringToUndefined = (value: unknown) => (value === '' ? undefined : value)

const idList = z
  .string()
  .default('')
  .transform(v => v.split(',').map(id => id.trim()).filter(id => id.length > 0))

const logLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'mark', 'off'])

export const envSchema = z.object({
  DATA_DIR: z.string().default(path.resolve('./data')),

  LOG_LEVEL: logLevel.default('info'),
  // 默认不写文件，避免测试和一次性脚本在工作目录下留下日志
  LOG_FILE_LEVEL: logLevel.default('off'),
  // 未设置时放在 DATA_DIR/logs 下
  LOG_FILE: z.preprocess(emptyStringToUndefined, z.string().optional()),

  // 私聊触发命令时用于查找成员身份的主服务器
  HOME_SCOPE_ID: z.preprocess(emptyStringToUndefined, z.string().optional()),

  ADMIN_ROLE_IDS: idList,
  MODERATOR_ROLE_IDS: idList,
  BOT_OWNERS: idList,

  COMMAND_PREFIX: z.string().min(1).default('!'),
}).transform(value => ({
  ...value,
  LOG_FILE: value.LOG_FILE ?? path.join(value.DATA_DIR, 'logs', 'app.log'),
}))

export type Env = z.infer<typeof envSchema>

/**
 * 解析环境变量，失败时返回 zod 错误而不是退出进程
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source)
}

function loadEnv(): Env {
  const parsed = parseEnv(process.env)
  if (parsed.success)
    return parsed.data
  console.error('环境变量解析错误:', parsed.error.format())
  return process.exit(1)
}

const env = loadEnv()

export default env
