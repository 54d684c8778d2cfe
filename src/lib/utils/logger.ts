import winston from 'winston'

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
)

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}] [${String(component)}] ${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  })
)

/**
 * One logger per component, e.g. `createLogger('resolver')`.
 * `LOG_FILE` adds a JSON file transport next to the console one.
 */
export function createLogger(component: string): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat }),
  ]
  if (process.env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: process.env.LOG_FILE,
        maxsize: 5242880,
        maxFiles: 5,
      })
    )
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    silent: process.env.LOG_SILENT === 'true',
    transports,
  })
}

export const logger = createLogger('app')
