import fs from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import { inspect } from 'node:util'
import env from './env'

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type EnvLogLevel = LogLevel | 'mark' | 'off'

const levelId: Record<EnvLogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
  mark: 3,
  off: 7,
}

function isEnvLogLevel(level: string): level is EnvLogLevel {
  return Object.prototype.hasOwnProperty.call(levelId, level)
}

export function normalizeLevel(level: string | undefined): EnvLogLevel {
  const normalized = (level || '').toLowerCase()
  return isEnvLogLevel(normalized) ? normalized : 'info'
}

let consoleThreshold = levelId[normalizeLevel(env.LOG_LEVEL)]
const fileThreshold = levelId[normalizeLevel(env.LOG_FILE_LEVEL)]
const tz = process.env.TZ || 'UTC'
const timeFormatter = new Intl.DateTimeFormat('sv-SE', {
  timeZone: tz,
  hour12: false,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
})
const dateFormatter = new Intl.DateTimeFormat('sv-SE', {
  timeZone: tz,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
})

const logDir = path.dirname(env.LOG_FILE)
let fileStream: fs.WriteStream | null = null
let fileLoggingEnabled = fileThreshold < levelId.off
let currentDate = dateFormatter.format(new Date())

function openFileStream() {
  try {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true })
    }
    // 文件名固定为 YYYY-MM-DD.1.log
    fileStream = fs.createWriteStream(path.join(logDir, `${currentDate}.1.log`), { flags: 'a' })
  }
  catch {
    fileLoggingEnabled = false
    fileStream = null
  }
}

if (fileLoggingEnabled) {
  openFileStream()
}

export function rotateIfNeeded() {
  if (!fileLoggingEnabled || !fileStream)
    return
  const today = dateFormatter.format(new Date())
  if (today === currentDate)
    return
  fileStream.end()
  currentDate = today
  openFileStream()
}

function formatArgs(args: unknown[], color = false) {
  return args.map(arg => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4, colors: color, breakLength: 120 })))
}

const resetColor = '\x1B[0m'

const MODULE_COLORS = {
  bold_white: '\x1B[1;97m',
  orange: '\x1B[38;5;208m',
  steel_blue: '\x1B[38;5;67m',
  soft_pink: '\x1B[38;5;175m',
  bright_green: '\x1B[38;5;82m',
  bright_purple: '\x1B[95m',
  cyan: '\x1B[38;5;45m',
} as const

const LOGGER_COLOR_MAP: Record<string, string> = {
  // Command System
  CommandClient: MODULE_COLORS.bold_white,
  CommandContext: MODULE_COLORS.orange,
  ResponseTracker: MODULE_COLORS.soft_pink,
}

function getLoggerColor(name: string): string {
  const direct = LOGGER_COLOR_MAP[name]
  if (direct)
    return direct

  // Prefix match (e.g. "CommandContext - ping" matching CommandContext)
  for (const [key, color] of Object.entries(LOGGER_COLOR_MAP)) {
    if (name.startsWith(key))
      return color
  }

  const safeColors = [
    MODULE_COLORS.steel_blue,
    MODULE_COLORS.bright_green,
    MODULE_COLORS.bright_purple,
    MODULE_COLORS.cyan,
  ]
  let hash = 0
  for (let i = 0; i < name.length; i++) {
    hash = name.charCodeAt(i) + ((hash << 5) - hash)
  }
  return safeColors[Math.abs(hash) % safeColors.length]
}

function highlightContent(str: string): string {
  return str
    .replace(/(\[Commands\]|\[Respond\]|\[Permission\])/g, '\x1B[93m$1\x1B[0m')
    .replace(/((?:invocation|channelId|messageId|actorId|scopeId|permission):)/g, '\x1B[90m$1\x1B[0m')
    .replace(/(: )(\d+|'[^']*')/g, '$1\x1B[33m$2\x1B[0m')
}

function logToConsole(logger: string, level: LogLevel, args: unknown[]) {
  if (levelId[level] < consoleThreshold || consoleThreshold >= levelId.off)
    return
  const time = timeFormatter.format(new Date()).replace(' ', 'T')
  const prefix = `${getLoggerColor(logger)}[${time}] ${level.toUpperCase().padEnd(5)} ${logger.padEnd(24)}${resetColor} :`
  const message = formatArgs(args, true).map(highlightContent).join(' ')
  process.stdout.write(`${message ? `${prefix} ${message}` : prefix}\n`)
}

function logToFile(logger: string, level: LogLevel, args: unknown[]) {
  if (!fileLoggingEnabled || fileThreshold >= levelId.off || levelId[level] < fileThreshold)
    return
  rotateIfNeeded()

  // rotateIfNeeded() may have disabled file logging
  if (!fileLoggingEnabled || !fileStream)
    return

  const payload = {
    time: timeFormatter.format(new Date()).replace(' ', 'T'),
    level,
    logger,
    messages: formatArgs(args, false),
  }
  fileStream.write(`${JSON.stringify(payload)}\n`)
}

export interface AppLogger {
  trace: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  fatal: (...args: unknown[]) => void
}

export function setConsoleLogLevel(level: EnvLogLevel) {
  consoleThreshold = levelId[level]
}

export function getLogger(name: string): AppLogger {
  const emit = (level: LogLevel, ...args: unknown[]) => {
    logToConsole(name, level, args)
    logToFile(name, level, args)
  }

  return {
    trace: (...args: unknown[]) => emit('trace', ...args),
    debug: (...args: unknown[]) => emit('debug', ...args),
    info: (...args: unknown[]) => emit('info', ...args),
    warn: (...args: unknown[]) => emit('warn', ...args),
    error: (...args: unknown[]) => emit('error', ...args),
    fatal: (...args: unknown[]) => emit('fatal', ...args),
  }
}

export default getLogger
