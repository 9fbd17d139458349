import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type RepostSyncLoggerOptions = LoggerOptions | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

/**
 * Serializes errors including the `code` and `statusCode` carried by repost errors.
 */
function createErrorSerializer() {
  return (err: unknown): unknown => {
    if (err == null || typeof err !== 'object') {
      return err
    }

    const serialized: Record<string, unknown> = {}
    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('code' in err && err.code !== undefined) serialized.code = err.code
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    // Stack traces only for server-side failures
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : undefined
    if ('stack' in err && err.stack && (!statusCode || statusCode >= 500)) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      serialized.cause = createErrorSerializer()(err.cause)
    }

    return serialized
  }
}

/**
 * Returns a serializer for Fastify requests that redacts credentials from the URL.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Generates a log filename using the given date and optional index.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'repost-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `repost-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under `data/logs`, or falls back to stdout
 * when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Generates logger configuration options from environment variables.
 *
 * - enableConsoleOutput: pretty terminal output (default: true)
 * - enableFileLogging: rotating log files under data/logs (default: false)
 */
export function createLoggerConfig(): RepostSyncLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const enableFileLogging = process.env.enableFileLogging === 'true'

  if (!enableFileLogging) {
    return getTerminalOptions()
  }

  const fileStream = getFileStream()
  const streams: pino.StreamEntry[] = [{ stream: fileStream }]

  // Avoid double-logging if the file stream fell back to stdout
  if (enableConsoleOutput && fileStream !== process.stdout) {
    streams.unshift({
      stream: pino.transport({
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          colorize: true,
        },
      }),
    })
  }

  return {
    level: 'info',
    stream: pino.multistream(streams),
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Creates a child logger whose messages are prefixed with `[SERVICE]`.
 *
 * @param baseLog - Parent logger, usually `fastify.log`
 * @param service - Upper-case service tag, e.g. 'REPOSTS'
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${service}] ` })
}
