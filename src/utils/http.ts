import type { z } from 'zod'
import {
  parseRemoteErrorMessage,
  RemoteRequestError,
  type RemoteService,
} from './remote-error.js'

export interface RemoteRequest {
  service: RemoteService
  url: URL
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH'
  headers?: Record<string, string>
  /** Sent as JSON unless it is already a URLSearchParams form body */
  body?: unknown
  timeoutMs: number
}

/**
 * Performs a request with a bounded timeout and returns the raw response when
 * it is 2xx.
 *
 * @throws {RemoteRequestError} on network failure, timeout or non-2xx status
 */
export async function sendRequest(request: RemoteRequest): Promise<Response> {
  const { service, url, method = 'GET', timeoutMs } = request
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...request.headers,
  }

  let body: string | URLSearchParams | undefined
  if (request.body instanceof URLSearchParams) {
    body = request.body
  } else if (request.body !== undefined) {
    body = JSON.stringify(request.body)
    headers['Content-Type'] = 'application/json'
  }

  let response: Response
  try {
    response = await fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    throw new RemoteRequestError(
      `${method} ${url.pathname} failed: ${error instanceof Error ? error.message : String(error)}`,
      service,
      url.pathname,
      undefined,
      { cause: error },
    )
  }

  if (!response.ok) {
    const detail = parseRemoteErrorMessage(await response.text())
    throw new RemoteRequestError(
      `${method} ${url.pathname} returned ${response.status} ${response.statusText}${detail ? `: ${detail}` : ''}`,
      service,
      url.pathname,
      response.status,
    )
  }

  return response
}

/**
 * Performs a request and validates the JSON body against `schema`.
 *
 * @throws {RemoteRequestError} on transport failure, non-2xx status or a body
 * that does not match the schema
 */
export async function requestJson<S extends z.ZodTypeAny>(
  request: RemoteRequest,
  schema: S,
): Promise<z.output<S>> {
  const response = await sendRequest(request)
  const { url, service } = request

  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    throw new RemoteRequestError(
      `${url.pathname} returned a body that is not JSON`,
      service,
      url.pathname,
      response.status,
      { cause: error },
    )
  }

  const result = schema.safeParse(payload)
  if (!result.success) {
    throw new RemoteRequestError(
      `${url.pathname} returned an unexpected payload`,
      service,
      url.pathname,
      response.status,
      { cause: result.error },
    )
  }
  return result.data
}
