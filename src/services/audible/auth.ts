/**
 * Audible session handling: loading the saved session, mapping the
 * marketplace locale to its API domain, and refreshing the access token.
 */
import { readFile } from 'node:fs/promises'
import {
  AudibleAuthFileSchema,
  AudibleTokenRefreshResponseSchema,
} from '@schemas/audible/audible.schema.js'
import { requestJson } from '@utils/http.js'
import type { FastifyBaseLogger } from 'fastify'

/** App identity the Audible Android app uses when exchanging refresh tokens */
const AUDIBLE_APP_NAME = 'Audible'
const AUDIBLE_APP_VERSION = '3.56.2'

/** Refresh this long before the token actually expires */
const REFRESH_MARGIN_MS = 60_000

const LOCALE_DOMAINS: Record<string, string> = {
  us: 'com',
  ca: 'ca',
  uk: 'co.uk',
  au: 'com.au',
  fr: 'fr',
  de: 'de',
  jp: 'co.jp',
  it: 'it',
  in: 'in',
  es: 'es',
  br: 'com.br',
}

export interface AudibleSession {
  accessToken: string
  refreshToken?: string
  /** Access token expiry, epoch ms, 0 when unknown */
  expiresAt: number
  /** Top-level domain of the marketplace, e.g. `co.uk` */
  domain: string
}

export interface AudibleSessionSource {
  locale: string
  authPath: string
  /** Base64-encoded session JSON, preferred over the file when set */
  authJsonB64: string
}

export function resolveAudibleDomain(locale: string): string | null {
  return LOCALE_DOMAINS[locale.trim().toLowerCase()] ?? null
}

export function audibleApiBase(session: AudibleSession): URL {
  return new URL(`https://api.audible.${session.domain}`)
}

/**
 * Reads the saved session from the base64 setting or the auth file.
 *
 * @returns The session, or null when it is missing or unusable (logged)
 */
export async function loadAudibleSession(
  source: AudibleSessionSource,
  log: FastifyBaseLogger,
): Promise<AudibleSession | null> {
  let raw: string
  if (source.authJsonB64) {
    raw = Buffer.from(source.authJsonB64, 'base64').toString('utf8')
  } else {
    try {
      raw = await readFile(source.authPath, 'utf8')
    } catch (error) {
      log.error({ error }, `Audible auth file not found at ${source.authPath}`)
      return null
    }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    log.error({ error }, 'Audible auth data is not valid JSON')
    return null
  }

  const result = AudibleAuthFileSchema.safeParse(parsed)
  if (!result.success) {
    log.error(
      { issues: result.error.issues },
      'Audible auth data has no usable access token',
    )
    return null
  }

  const locale = source.locale || result.data.locale_code || 'us'
  const domain = resolveAudibleDomain(locale)
  if (!domain) {
    log.error(`Unsupported Audible locale: ${locale}`)
    return null
  }

  return {
    accessToken: result.data.access_token,
    refreshToken: result.data.refresh_token,
    expiresAt: result.data.expires ? Math.round(result.data.expires * 1000) : 0,
    domain,
  }
}

export function needsRefresh(session: AudibleSession, now: number): boolean {
  return (
    session.refreshToken !== undefined &&
    session.expiresAt > 0 &&
    session.expiresAt - REFRESH_MARGIN_MS <= now
  )
}

/**
 * Exchanges the refresh token for a new access token.
 *
 * @throws {RemoteRequestError} when Amazon rejects the exchange
 */
export async function refreshAudibleSession(
  session: AudibleSession,
  timeoutMs: number,
  now: number,
): Promise<AudibleSession> {
  if (!session.refreshToken) {
    return session
  }

  const body = new URLSearchParams({
    app_name: AUDIBLE_APP_NAME,
    app_version: AUDIBLE_APP_VERSION,
    source_token: session.refreshToken,
    requested_token_type: 'access_token',
    source_token_type: 'refresh_token',
  })

  const response = await requestJson(
    {
      service: 'amazon-auth',
      url: new URL(`https://api.amazon.${session.domain}/auth/token`),
      method: 'POST',
      body,
      timeoutMs,
    },
    AudibleTokenRefreshResponseSchema,
  )

  return {
    ...session,
    accessToken: response.access_token,
    expiresAt: now + response.expires_in * 1000,
  }
}
