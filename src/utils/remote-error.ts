export type RemoteService = 'audible' | 'audiobookshelf' | 'amazon-auth'

/**
 * Raised by the HTTP helpers when a remote service answers with a non-2xx
 * status, an unparsable body, or not at all.
 */
export class RemoteRequestError extends Error {
  constructor(
    message: string,
    readonly service: RemoteService,
    readonly path: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'RemoteRequestError'
  }

  /** True for 404, which the clients treat as "no data" rather than a failure */
  get isNotFound(): boolean {
    return this.status === 404
  }
}

/**
 * Extracts a readable message from an error body.
 * Handles both formats:
 * - Object: { message: string } or { error: string } (Audible, Amazon auth)
 * - Plain text (Audiobookshelf)
 */
export function parseRemoteErrorMessage(body: string): string {
  const trimmed = body.trim()
  if (!trimmed) return ''

  let parsed: unknown
  try {
    parsed = JSON.parse(trimmed)
  } catch {
    parsed = undefined
  }

  if (parsed && typeof parsed === 'object') {
    if ('message' in parsed && typeof parsed.message === 'string') {
      return parsed.message
    }
    if ('error' in parsed && typeof parsed.error === 'string') {
      return parsed.error
    }
    if (
      'error_description' in parsed &&
      typeof parsed.error_description === 'string'
    ) {
      return parsed.error_description
    }
  }

  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed
}
