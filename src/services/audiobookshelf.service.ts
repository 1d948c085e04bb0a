/**
 * Audiobookshelf Client
 *
 * Talks to a self-hosted Audiobookshelf server with a user API token: reads
 * the user's media progress, resolves ASINs to library items and writes new
 * positions back. Failed calls are logged and produce empty results.
 */
import {
  LibrariesResponseSchema,
  LibrarySearchResponseSchema,
  MediaProgressSchema,
  MeResponseSchema,
  type MediaProgress,
  type SearchEntry,
} from '@schemas/audiobookshelf/audiobookshelf.schema.js'
import type {
  AbsItemProgress,
  AbsProgress,
  AudiobookshelfProgressSource,
} from '@root/types/progress-source.types.js'
import { requestJson, sendRequest, type RemoteRequest } from '@utils/http.js'
import { createServiceLogger } from '@utils/logger.js'
import { RemoteRequestError } from '@utils/remote-error.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

const SEARCH_LIMIT = 5

export interface AudiobookshelfClientOptions {
  baseUrl: string
  token: string
  /** Read another user's progress through the admin users endpoint */
  userId: string
  /** Restrict ASIN lookups to one library; all libraries when empty */
  libraryId: string
  requestTimeoutMs: number
  dryRun: boolean
}

export class AudiobookshelfClient implements AudiobookshelfProgressSource {
  private readonly log: FastifyBaseLogger
  private ready = false
  private readonly itemIdsByAsin = new Map<string, string>()
  private libraryIds: string[] = []

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: AudiobookshelfClientOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'AUDIOBOOKSHELF')
  }

  isReady(): boolean {
    return this.ready
  }

  /**
   * Confirms the token against the user endpoint and collects the libraries
   * searched when resolving ASINs.
   */
  async initialize(): Promise<void> {
    this.ready = false
    const { baseUrl, token, libraryId } = this.options
    if (!baseUrl || !token) {
      this.log.warn(
        'Audiobookshelf URL or token not configured, Audiobookshelf sync disabled',
      )
      return
    }

    try {
      const user = await this.fetchUser()
      this.log.info(`Connected to Audiobookshelf as user ${user.id ?? 'unknown'}`)
    } catch (error) {
      this.log.error({ error }, 'Failed to authenticate with Audiobookshelf')
      return
    }

    if (libraryId) {
      this.libraryIds = [libraryId]
    } else {
      try {
        const response = await this.get(
          '/api/libraries',
          LibrariesResponseSchema,
        )
        this.libraryIds = response.libraries.map((library) => library.id)
      } catch (error) {
        this.log.warn({ error }, 'Failed to list Audiobookshelf libraries')
        this.libraryIds = []
      }
    }

    this.ready = true
  }

  async getInProgress(): Promise<Map<string, AbsProgress>> {
    const items = new Map<string, AbsProgress>()
    if (!this.ready) return items

    let progress: MediaProgress[]
    try {
      progress = (await this.fetchUser()).mediaProgress
    } catch (error) {
      this.log.error({ error }, 'Failed to fetch Audiobookshelf progress')
      return items
    }

    for (const entry of progress) {
      if (entry.isFinished) continue
      const asin = entry.media?.metadata?.asin
      const itemId = entry.libraryItemId ?? entry.media?.id
      const position = entry.currentTime
      if (!asin || !itemId || position === null || position === undefined) {
        continue
      }

      this.itemIdsByAsin.set(asin, itemId)
      items.set(asin, {
        asin,
        itemId,
        positionSeconds: position,
        durationSeconds: entry.duration ?? entry.media?.duration,
        updatedAt: entry.lastUpdate ?? 0,
      })
    }

    this.log.debug(`Found ${items.size} in-progress Audiobookshelf items`)
    return items
  }

  async getItemProgress(itemId: string): Promise<AbsItemProgress | null> {
    if (!this.ready) return null
    try {
      const entry = await this.get(
        `/api/me/progress/${encodeURIComponent(itemId)}`,
        MediaProgressSchema,
      )
      if (entry.currentTime === null || entry.currentTime === undefined) {
        return null
      }
      return {
        positionSeconds: entry.currentTime,
        durationSeconds: entry.duration ?? undefined,
        updatedAt: entry.lastUpdate ?? 0,
        isFinished: entry.isFinished ?? false,
      }
    } catch (error) {
      if (error instanceof RemoteRequestError && error.isNotFound) {
        return null
      }
      this.log.error({ error }, `Failed to fetch progress for item ${itemId}`)
      return null
    }
  }

  async updateProgress(
    itemId: string,
    positionSeconds: number,
  ): Promise<boolean> {
    if (!this.ready) return false
    const currentTime = Math.max(0, positionSeconds)

    if (this.options.dryRun) {
      this.log.info(
        `[DRY RUN] Would set Audiobookshelf progress for ${itemId} to ${currentTime.toFixed(1)}s`,
      )
      return true
    }

    try {
      await sendRequest(
        this.buildRequest(
          `/api/me/progress/${encodeURIComponent(itemId)}`,
          'PATCH',
          { currentTime, isFinished: false },
        ),
      )
      this.log.info(
        `Updated Audiobookshelf progress for ${itemId} to ${currentTime.toFixed(1)}s`,
      )
      return true
    } catch (error) {
      this.log.error(
        { error },
        `Failed to update Audiobookshelf progress for ${itemId}`,
      )
      return false
    }
  }

  /**
   * Looks the ASIN up in the cache filled by {@link getInProgress}, then
   * searches the configured libraries for an exact ASIN match.
   */
  async resolveItemId(asin: string): Promise<string | null> {
    const cached = this.itemIdsByAsin.get(asin)
    if (cached) return cached
    if (!this.ready) return null

    for (const libraryId of this.libraryIds) {
      let entries: SearchEntry[]
      try {
        entries = await this.get(
          `/api/libraries/${encodeURIComponent(libraryId)}/search`,
          LibrarySearchResponseSchema,
          { q: asin, limit: String(SEARCH_LIMIT) },
        )
      } catch (error) {
        this.log.warn(
          { error },
          `Failed to search library ${libraryId} for ${asin}`,
        )
        continue
      }

      const match = entries.find(
        (entry) =>
          entry.id &&
          entry.media?.metadata?.asin?.toUpperCase() === asin.toUpperCase(),
      )
      if (match?.id) {
        this.itemIdsByAsin.set(asin, match.id)
        return match.id
      }
    }

    this.log.debug(`No Audiobookshelf item found for ${asin}`)
    return null
  }

  private fetchUser() {
    const { userId } = this.options
    const path = userId
      ? `/api/users/${encodeURIComponent(userId)}`
      : '/api/me'
    return this.get(path, MeResponseSchema)
  }

  private get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params: Record<string, string> = {},
  ): Promise<z.output<S>> {
    const request = this.buildRequest(path, 'GET')
    for (const [key, value] of Object.entries(params)) {
      request.url.searchParams.set(key, value)
    }
    return requestJson(request, schema)
  }

  private buildRequest(
    path: string,
    method: RemoteRequest['method'],
    body?: unknown,
  ): RemoteRequest {
    return {
      service: 'audiobookshelf',
      url: new URL(`${this.options.baseUrl}${path}`),
      method,
      body,
      headers: { Authorization: `Bearer ${this.options.token}` },
      timeoutMs: this.options.requestTimeoutMs,
    }
  }
}
