import winston from 'winston'

export type Logger = winston.Logger

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug']

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Resolve log level from environment.
 *
 * CLOUDFORGE_LOG_LEVEL takes precedence over LOG_LEVEL. Tests only log errors
 * unless a level is set explicitly.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const explicit = env.CLOUDFORGE_LOG_LEVEL ?? env.LOG_LEVEL
    if (isLogLevel(explicit)) {
        return explicit
    }
    return env.NODE_ENV === 'test' ? 'error' : 'info'
}

const rootLogger = winston.createLogger({
    level: resolveLogLevel(),
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
            const prefix = typeof component === 'string' ? ` [${component}]` : ''
            return `${timestamp} ${level.toUpperCase()}${prefix} ${message}${metaStr}`
        })
    ),
    transports: [
        new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })
    ]
})

export function getLogger(name: string): Logger {
    return rootLogger.child({ component: name })
}

export function setLogLevel(level: LogLevel): void {
    rootLogger.level = level
}
