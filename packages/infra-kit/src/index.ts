export { default as env, envSchema, parseEnv } from './env'
export type { Env } from './env'

export {
  type AppLogger,
  type EnvLogLevel,
  getLogger,
  normalizeLevel,
  rotateIfNeeded,
  setConsoleLogLevel,
} from './logger'
