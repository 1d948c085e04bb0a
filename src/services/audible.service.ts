/**
 * Audible Client
 *
 * Reads and writes listening positions through the Audible mobile API using
 * the saved session of a registered device. Bearer authentication, with the
 * access token refreshed shortly before it expires or after a 401.
 *
 * Every public call logs and swallows remote failures so a flaky Audible
 * cycle leaves the sync pass with empty results instead of an exception.
 */
import {
  AudibleLastPositionsResponseSchema,
  AudibleLibraryResponseSchema,
  type AudibleLibraryItem,
} from '@schemas/audible/audible.schema.js'
import type {
  AudiblePosition,
  AudibleProgressSource,
} from '@root/types/progress-source.types.js'
import { requestJson, sendRequest, type RemoteRequest } from '@utils/http.js'
import { createServiceLogger } from '@utils/logger.js'
import { RemoteRequestError } from '@utils/remote-error.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import type { z } from 'zod'
import {
  type AudibleSession,
  audibleApiBase,
  loadAudibleSession,
  needsRefresh,
  refreshAudibleSession,
} from './audible/auth.js'
import {
  extractPositions,
  isInProgress,
  parseAudibleTimestamp,
} from './audible/positions.js'

const LIBRARY_PAGE_SIZE = 50
const DEEP_SCAN_MAX_PAGES = 20

export interface AudibleClientOptions {
  locale: string
  authPath: string
  authJsonB64: string
  batchSize: number
  deepScanMaxInProgress: number
  fetchConcurrency: number
  requestTimeoutMs: number
  dryRun: boolean
}

export class AudibleClient implements AudibleProgressSource {
  private readonly log: FastifyBaseLogger
  private session: AudibleSession | null = null
  private ready = false
  private refreshing: Promise<void> | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: AudibleClientOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'AUDIBLE')
  }

  isReady(): boolean {
    return this.ready
  }

  /**
   * Loads the saved session and confirms it with a one-item library call.
   * The client stays not-ready when either step fails.
   */
  async initialize(): Promise<void> {
    this.ready = false
    this.session = await loadAudibleSession(
      {
        locale: this.options.locale,
        authPath: this.options.authPath,
        authJsonB64: this.options.authJsonB64,
      },
      this.log,
    )
    if (!this.session) {
      this.log.warn('Audible session unavailable, Audible sync disabled')
      return
    }

    try {
      await this.get('/1.0/library', AudibleLibraryResponseSchema, {
        num_results: '1',
      })
      this.ready = true
      this.log.info(`Connected to Audible (${this.session.domain})`)
    } catch (error) {
      this.log.error({ error }, 'Failed to verify Audible session')
    }
  }

  async getLastPositions(
    asins: string[],
  ): Promise<Map<string, AudiblePosition>> {
    const positions = new Map<string, AudiblePosition>()
    if (!this.ready || asins.length === 0) return positions

    const batches: string[][] = []
    for (let i = 0; i < asins.length; i += this.options.batchSize) {
      batches.push(asins.slice(i, i + this.options.batchSize))
    }

    const limit = pLimit(this.options.fetchConcurrency)
    const results = await Promise.all(
      batches.map((batch) =>
        limit(async () => {
          try {
            const response = await this.get(
              '/1.0/annotations/lastpositions',
              AudibleLastPositionsResponseSchema,
              { asins: batch.join(',') },
            )
            return extractPositions(response)
          } catch (error) {
            this.log.error(
              { error, batchSize: batch.length },
              'Failed to fetch Audible positions for batch',
            )
            return new Map<string, AudiblePosition>()
          }
        }),
      ),
    )

    for (const batch of results) {
      for (const [asin, position] of batch) {
        positions.set(asin, position)
      }
    }
    this.log.debug(
      `Fetched ${positions.size} Audible positions for ${asins.length} ASINs`,
    )
    return positions
  }

  async updatePosition(asin: string, positionMs: number): Promise<boolean> {
    if (!this.ready) return false
    const position = Math.max(0, Math.round(positionMs))

    if (this.options.dryRun) {
      this.log.info(
        `[DRY RUN] Would set Audible position for ${asin} to ${position}ms`,
      )
      return true
    }

    try {
      await this.send({
        path: `/1.0/lastpositions/${encodeURIComponent(asin)}`,
        method: 'PUT',
        body: { asin, acr: asin, position_ms: position },
      })
      this.log.info(`Updated Audible position for ${asin} to ${position}ms`)
      return true
    } catch (error) {
      this.log.error({ error }, `Failed to update Audible position for ${asin}`)
      return false
    }
  }

  async getRecentlyPlayed(limit: number): Promise<string[]> {
    if (!this.ready || limit <= 0) return []
    try {
      const response = await this.get(
        '/1.0/library',
        AudibleLibraryResponseSchema,
        {
          num_results: String(limit),
          sort_by: '-DateAccessed',
          response_groups: 'listening_status',
        },
      )
      return collectAsins(response.items)
    } catch (error) {
      this.log.error({ error }, 'Failed to fetch recently played from Audible')
      return []
    }
  }

  async getNewlyPurchased(afterMs: number): Promise<string[]> {
    if (!this.ready) return []
    try {
      const response = await this.get(
        '/1.0/library',
        AudibleLibraryResponseSchema,
        {
          num_results: String(LIBRARY_PAGE_SIZE),
          sort_by: '-PurchaseDate',
          purchased_after: new Date(afterMs).toISOString(),
          response_groups: 'product_desc',
        },
      )
      // The API filter is advisory on some marketplaces
      return collectAsins(
        response.items.filter((item) => {
          const purchased = parseAudibleTimestamp(item.purchase_date)
          return purchased === undefined || purchased >= afterMs
        }),
      )
    } catch (error) {
      this.log.error({ error }, 'Failed to fetch new purchases from Audible')
      return []
    }
  }

  /**
   * Pages through the library collecting partially listened titles, up to
   * the configured maximum.
   */
  async deepScanInProgress(): Promise<string[]> {
    if (!this.ready) return []
    const { deepScanMaxInProgress } = this.options
    const found: string[] = []

    try {
      for (let page = 1; page <= DEEP_SCAN_MAX_PAGES; page++) {
        const response = await this.get(
          '/1.0/library',
          AudibleLibraryResponseSchema,
          {
            num_results: String(LIBRARY_PAGE_SIZE),
            page: String(page),
            response_groups: 'listening_status,percent_complete',
          },
        )

        for (const asin of collectAsins(response.items.filter(isInProgress))) {
          found.push(asin)
          if (found.length >= deepScanMaxInProgress) {
            return found
          }
        }

        if (response.items.length < LIBRARY_PAGE_SIZE) break
      }
    } catch (error) {
      this.log.error(
        { error, found: found.length },
        'Audible deep scan stopped early',
      )
    }

    this.log.debug(`Deep scan found ${found.length} in-progress titles`)
    return found
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params: Record<string, string> = {},
  ): Promise<z.output<S>> {
    return this.withAuth(async (session) => {
      const url = new URL(path, audibleApiBase(session))
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value)
      }
      return requestJson(this.buildRequest(session, url, 'GET'), schema)
    })
  }

  private async send(request: {
    path: string
    method: 'PUT' | 'POST'
    body: unknown
  }): Promise<void> {
    await this.withAuth(async (session) => {
      const url = new URL(request.path, audibleApiBase(session))
      await sendRequest(
        this.buildRequest(session, url, request.method, request.body),
      )
    })
  }

  private buildRequest(
    session: AudibleSession,
    url: URL,
    method: RemoteRequest['method'],
    body?: unknown,
  ): RemoteRequest {
    return {
      service: 'audible',
      url,
      method,
      body,
      headers: {
        Authorization: `Bearer ${session.accessToken}`,
        'client-id': '0',
      },
      timeoutMs: this.options.requestTimeoutMs,
    }
  }

  /**
   * Runs `call` with a fresh session, refreshing first when the token is
   * about to expire and once more when Audible answers 401.
   */
  private async withAuth<T>(
    call: (session: AudibleSession) => Promise<T>,
  ): Promise<T> {
    if (this.session && needsRefresh(this.session, this.now())) {
      await this.refresh()
    }
    const session = this.requireSession()

    try {
      return await call(session)
    } catch (error) {
      if (
        error instanceof RemoteRequestError &&
        error.status === 401 &&
        session.refreshToken
      ) {
        this.log.warn('Audible rejected the access token, refreshing')
        await this.refresh()
        return call(this.requireSession())
      }
      throw error
    }
  }

  private requireSession(): AudibleSession {
    if (!this.session) {
      throw new Error('Audible session is not loaded')
    }
    return this.session
  }

  /** Concurrent callers share one refresh */
  private refresh(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.doRefresh().finally(() => {
        this.refreshing = null
      })
    }
    return this.refreshing
  }

  private async doRefresh(): Promise<void> {
    const session = this.requireSession()
    this.session = await refreshAudibleSession(
      session,
      this.options.requestTimeoutMs,
      this.now(),
    )
    this.log.info('Refreshed Audible access token')
  }
}

function collectAsins(items: AudibleLibraryItem[]): string[] {
  const asins: string[] = []
  for (const item of items) {
    if (item.asin && !asins.includes(item.asin)) {
      asins.push(item.asin)
    }
  }
  return asins
}
