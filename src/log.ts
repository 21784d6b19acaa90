import Debug from 'debug'
import { format } from 'util'
import winston, { Logger as WinstonLogger } from 'winston'
import Transport from 'winston-transport'
export enum LogLevelEnum {
  verbose = 'verbose',
  info = 'info',
  warn = 'warn',
  error = 'error',
}
const debug = Debug('logger')

interface LogInfo {
  level?: string
  message?: unknown
  label?: unknown
}

function isTestRun(): boolean {
  return process.env['VITEST'] !== undefined
}

export function levelFromEnv(value: string | undefined): LogLevelEnum {
  const found = Object.values(LogLevelEnum).find((level) => level === value)
  return found ?? LogLevelEnum.info
}

class DebugTransport extends Transport {
  constructor() {
    super()
  }
  // Winston transport contract: log(info, next)
  override log(info: LogInfo, next?: () => void): void {
    setImmediate(() => {
      const level = info.level ?? 'info'
      const label = typeof info.label === 'string' ? ` ${info.label}` : ''
      const msg = info.message !== undefined ? String(info.message) : JSON.stringify(info)
      debug(`${level}${label}: ${msg}`)
      this.emit('logged', info)
    })
    if (next) next()
  }
}

function labelOf(info: winston.Logform.TransformableInfo): string {
  const label = info['label']
  return typeof label === 'string' ? ' ' + label : ''
}

/* Logger makes it easy to set a source file specific prefix.
 * Inside the test runner the output is forwarded to debug('logger'), so it stays quiet unless DEBUG asks for it.
 */
export class Logger {
  private logger: WinstonLogger

  constructor(private prefix: string) {
    const commonLabel = winston.format.label({ label: this.prefix })
    const lineFormat = !isTestRun()
      ? winston.format.combine(
          winston.format.timestamp(),
          commonLabel,
          winston.format.printf((info) => {
            const time = typeof info['timestamp'] === 'string' ? info['timestamp'] + ' ' : ''
            return `${time}${info.level}${labelOf(info)}: ${String(info.message)}`
          })
        )
      : winston.format.combine(
          commonLabel,
          winston.format.printf((info) => `${info.level}${labelOf(info)}: ${String(info.message)}`)
        )

    const loggerTransport = isTestRun() ? new DebugTransport() : new winston.transports.Console()
    this.logger = winston.createLogger({
      level: levelFromEnv(process.env['LOG_LEVEL']),
      format: lineFormat,
      transports: [loggerTransport],
    })
  }

  log(level: LogLevelEnum, message: unknown, ...args: unknown[]): void {
    const msg = format(message, ...args)
    this.logger.log({ level: level, message: msg })
  }
}
