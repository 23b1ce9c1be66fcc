export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace'

export type Logger = {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  trace(message: string): void
}

export type LoggerOptions = {
  prefix: string
  level?: LogLevel
  write?: (line: string) => void
  color?: boolean
}

const PRIORITY: Record<LogLevel, number> = {
  error: 3,
  warn: 4,
  info: 6,
  debug: 7,
  trace: 8,
}

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

const LEVEL_COLOR: Record<LogLevel, string> = {
  error: colors.red,
  warn: colors.yellow,
  info: colors.cyan,
  debug: colors.dim,
  trace: colors.dim,
}

export function createLogger(options: LoggerOptions): Logger {
  const {
    prefix,
    level = 'info',
    write = (line: string) => process.stderr.write(`${line}\n`),
    color = process.stderr.isTTY === true,
  } = options

  const emit = (messageLevel: LogLevel, message: string) => {
    if (PRIORITY[messageLevel] > PRIORITY[level]) return

    const tag = color
      ? `${LEVEL_COLOR[messageLevel]}${messageLevel}${colors.reset}`
      : messageLevel
    write(`${prefix} ${tag} ${message}`)
  }

  return {
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
    trace: (message) => emit('trace', message),
  }
}

export const SILENT_LOGGER: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  trace: () => {},
}
