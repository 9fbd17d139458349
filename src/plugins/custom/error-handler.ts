import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { RepostError } from '@root/types/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  409: 'Conflict',
  502: 'Bad Gateway',
}

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 *
 * Repost errors keep their message at every status since it is safe to show
 * the user; other server errors are masked.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError | RepostError, request, reply) => {
    const statusCode = err.statusCode ?? 500
    // Avoid logging query/params to prevent leaking tokens/PII
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    // Use appropriate log level based on status code
    if (statusCode === 401) {
      request.log.warn(logData, 'Authentication required')
    } else if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)

    if (err instanceof RepostError) {
      const payload: ErrorResponse = {
        statusCode,
        code: err.code,
        error: STATUS_TEXT[statusCode] ?? 'Error',
        message: err.message,
      }
      return payload
    }

    const isServerError = statusCode >= 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : (STATUS_TEXT[statusCode] ?? 'Client Error'),
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
