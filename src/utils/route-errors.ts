import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface RouteErrorContext {
  message: string
  [key: string]: unknown
}

/**
 * Logs a route failure with the request identity but without query/params,
 * which may carry tokens.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  context: RouteErrorContext,
): void {
  const { message, ...extra } = context
  log.error(
    {
      error,
      ...extra,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
      },
    },
    message,
  )
}
