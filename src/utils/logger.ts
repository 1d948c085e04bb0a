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

type ServiceLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

const SENSITIVE_QUERY_PARAMS = ['token', 'apiKey', 'access_token', 'X-Token']

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true, // Force colors even in Docker
}

/**
 * Creates an error serializer that handles standard errors, remote request
 * errors carrying a status, plain objects and primitives thrown as errors.
 */
export function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : typeof err === 'boolean'
              ? 'BooleanError'
              : 'UnknownError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // 4xx responses from a remote service are expected noise, skip their stacks
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    if ('stack' in err && err.stack && (!status || status >= 500)) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'type', 'cause'].includes(key)
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a serializer for Fastify requests that redacts token-like query
 * parameters from the URL.
 */
export function createRequestSerializer() {
  return (req: FastifyRequest) => {
    let url = req.url
    for (const param of SENSITIVE_QUERY_PARAMS) {
      url = url.replace(
        new RegExp(`([?&])${param}=([^&]+)`, 'gi'),
        `$1${param}=[REDACTED]`,
      )
    }

    return {
      method: req.method,
      url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }
  }
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * Falsy time yields 'listening-sync-current.log'; otherwise
 * 'listening-sync-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'listening-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `listening-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logging, ensuring the log directory exists.
 * Falls back to stdout when the directory cannot be created.
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

function getSerializers() {
  return {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: getSerializers(),
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Always logs to file. Environment variables:
 * - enableConsoleOutput: Show logs in terminal (default: true)
 */
export function createLoggerConfig(): ServiceLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false' // Default true

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return {
      level: 'info',
      stream: fileStream,
      serializers: getSerializers(),
    }
  }

  // Avoid double-logging if file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: getSerializers(),
  }
}

/**
 * Creates a child logger whose messages are prefixed with the service name,
 * e.g. `[AUDIBLE] Updated position`.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
