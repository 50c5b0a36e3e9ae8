import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from './data-dir.js'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type SyncLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean
  | null
  | undefined

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

/**
 * Creates an error serializer that keeps message, name, status codes, the
 * sync error `code`, the cause chain and any extra enumerable properties.
 * Stack traces are left out for 4xx errors.
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('code' in err && err.code !== undefined) serialized.code = err.code
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      const { cause } = err
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : String(cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        ![
          'message',
          'stack',
          'name',
          'code',
          'status',
          'statusCode',
          'type',
          'cause',
        ].includes(key)
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }
  return serialize
}

/**
 * Redacts credentials from a request URL before it is logged
 */
export function redactUrl(url: string): string {
  return url
    .replace(/([?&])access_token=([^&]+)/gi, '$1access_token=[REDACTED]')
    .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
    .replace(/([?&])client_id=([^&]+)/gi, '$1client_id=[REDACTED]')
}

export function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  })
}

/**
 * Log filename for a rotation date: `history-sync-YYYY-MM-DD[-index].log`,
 * or `history-sync-current.log` for the live file.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'history-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `history-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under the log directory; stdout when the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
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

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getSerializers() {
  return {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }
}

/**
 * Logger configuration from the environment. Logs always go to a rotating
 * file; `enableConsoleOutput=false` turns the pretty terminal copy off.
 */
export function createLoggerConfig(): SyncLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return {
      level: 'info',
      stream: fileStream,
      serializers: getSerializers(),
    }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return {
      level: 'info',
      transport: { target: 'pino-pretty', options: prettyOptions },
      serializers: getSerializers(),
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: getSerializers(),
  }
}

/**
 * Child logger whose messages carry an uppercased `[SERVICE] ` prefix
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
