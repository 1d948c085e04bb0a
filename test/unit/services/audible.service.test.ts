import { AudibleClient, type AudibleClientOptions } from '@services/audible.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import {
  AUDIBLE_API,
  type AudibleApiState,
  type AudibleLibraryEntry,
  createAudibleApiHandlers,
  createAudibleApiState,
} from '../../mocks/audible-api-handlers.js'
import { createMockLogger } from '../../mocks/logger.js'
import { server } from '../../setup/msw-setup.js'

function encodeSession(session: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(session)).toString('base64')
}

const inAnHour = () => Math.floor(Date.now() / 1000) + 3600

describe('AudibleClient', () => {
  let state: AudibleApiState
  let logger: FastifyBaseLogger

  const createClient = (overrides: Partial<AudibleClientOptions> = {}) =>
    new AudibleClient(logger, {
      locale: 'us',
      authPath: '/nonexistent/audible-auth.json',
      authJsonB64: encodeSession({
        access_token: 'test-access-token',
        refresh_token: 'test-refresh-token',
        expires: inAnHour(),
      }),
      batchSize: 50,
      deepScanMaxInProgress: 100,
      fetchConcurrency: 2,
      requestTimeoutMs: 5_000,
      dryRun: false,
      ...overrides,
    })

  const createReadyClient = async (
    overrides: Partial<AudibleClientOptions> = {},
  ) => {
    const client = createClient(overrides)
    await client.initialize()
    return client
  }

  beforeEach(() => {
    state = createAudibleApiState()
    logger = createMockLogger()
    server.use(...createAudibleApiHandlers(state))
  })

  describe('initialize', () => {
    it('becomes ready after verifying the session', async () => {
      const client = await createReadyClient()

      expect(client.isReady()).toBe(true)
      expect(state.libraryQueries[0].get('num_results')).toBe('1')
      expect(state.authHeaders).toEqual(['Bearer test-access-token'])
    })

    it('stays not ready without a saved session', async () => {
      const client = await createReadyClient({ authJsonB64: '' })

      expect(client.isReady()).toBe(false)
      expect(await client.getLastPositions(['B0MISSING1'])).toEqual(new Map())
      expect(await client.updatePosition('B0MISSING1', 1_000)).toBe(false)
      expect(await client.getRecentlyPlayed(5)).toEqual([])
      expect(await client.deepScanInProgress()).toEqual([])
      expect(state.authHeaders).toEqual([])
    })

    it('stays not ready for an unknown marketplace', async () => {
      const client = await createReadyClient({ locale: 'xx' })

      expect(client.isReady()).toBe(false)
      expect(logger.error).toHaveBeenCalledWith('Unsupported Audible locale: xx')
    })

    it('stays not ready when Audible rejects the session', async () => {
      state.validToken = 'test-some-other-token'
      const client = await createReadyClient({
        authJsonB64: encodeSession({ access_token: 'test-access-token' }),
      })

      expect(client.isReady()).toBe(false)
    })

    it('refreshes an expired access token first', async () => {
      state.validToken = 'test-refreshed-token'
      const client = await createReadyClient({
        authJsonB64: encodeSession({
          access_token: 'test-access-token',
          refresh_token: 'test-refresh-token',
          expires: Math.floor(Date.now() / 1000) - 10,
        }),
      })

      expect(client.isReady()).toBe(true)
      expect(state.authHeaders).toEqual(['Bearer test-refreshed-token'])
    })

    it('refreshes and retries once after a 401', async () => {
      state.validToken = 'test-refreshed-token'
      const client = await createReadyClient()

      expect(client.isReady()).toBe(true)
      expect(state.authHeaders).toEqual([
        'Bearer test-access-token',
        'Bearer test-refreshed-token',
      ])
    })
  })

  describe('getLastPositions', () => {
    it('fetches positions in batches and merges them', async () => {
      state.positions = { B0AAAAAAA1: 61_000, B0CCCCCCC3: 3_723_500 }
      const client = await createReadyClient({ batchSize: 2 })

      const positions = await client.getLastPositions([
        'B0AAAAAAA1',
        'B0BBBBBBB2',
        'B0CCCCCCC3',
      ])

      expect(state.positionQueries.sort()).toEqual([
        'B0AAAAAAA1,B0BBBBBBB2',
        'B0CCCCCCC3',
      ])
      expect(positions).toEqual(
        new Map([
          [
            'B0AAAAAAA1',
            { positionMs: 61_000, updatedAt: Date.UTC(2024, 2, 1, 18, 22, 5) },
          ],
          [
            'B0CCCCCCC3',
            {
              positionMs: 3_723_500,
              updatedAt: Date.UTC(2024, 2, 1, 18, 22, 5),
            },
          ],
        ]),
      )
    })

    it('treats a failed batch as unknown', async () => {
      const client = await createReadyClient()
      server.use(
        http.get(`${AUDIBLE_API}/1.0/annotations/lastpositions`, () =>
          HttpResponse.json({ message: 'Service unavailable' }, { status: 503 }),
        ),
      )

      const positions = await client.getLastPositions(['B0AAAAAAA1'])

      expect(positions.size).toBe(0)
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ batchSize: 1 }),
        'Failed to fetch Audible positions for batch',
      )
    })
  })

  describe('updatePosition', () => {
    it('puts the rounded position', async () => {
      const client = await createReadyClient()

      expect(await client.updatePosition('B0AAAAAAA1', 123_456.7)).toBe(true)

      expect(state.updates).toEqual([
        {
          asin: 'B0AAAAAAA1',
          body: { asin: 'B0AAAAAAA1', acr: 'B0AAAAAAA1', position_ms: 123_457 },
        },
      ])
    })

    it('only logs in dry-run mode', async () => {
      const client = await createReadyClient({ dryRun: true })

      expect(await client.updatePosition('B0AAAAAAA1', 5_000)).toBe(true)

      expect(state.updates).toEqual([])
      expect(logger.info).toHaveBeenCalledWith(
        '[DRY RUN] Would set Audible position for B0AAAAAAA1 to 5000ms',
      )
    })

    it('reports a rejected update', async () => {
      const client = await createReadyClient()
      server.use(
        http.put(`${AUDIBLE_API}/1.0/lastpositions/:asin`, () =>
          HttpResponse.json({ message: 'Bad request' }, { status: 400 }),
        ),
      )

      expect(await client.updatePosition('B0AAAAAAA1', 5_000)).toBe(false)
    })
  })

  describe('discovery', () => {
    it('lists recently played titles once each', async () => {
      const client = await createReadyClient()
      state.libraryPages = [
        [
          { asin: 'B0RECENT01' },
          { asin: 'B0RECENT02' },
          { asin: 'B0RECENT01' },
          { title: 'Podcast without an ASIN' },
        ],
      ]

      const asins = await client.getRecentlyPlayed(5)

      expect(asins).toEqual(['B0RECENT01', 'B0RECENT02'])
      const query = state.libraryQueries[1]
      expect(query.get('sort_by')).toBe('-DateAccessed')
      expect(query.get('num_results')).toBe('5')
    })

    it('keeps only purchases made after the cutoff', async () => {
      const client = await createReadyClient()
      state.libraryPages = [
        [
          { asin: 'B0NEWBUY01', purchase_date: '2024-03-01T10:00:00Z' },
          { asin: 'B0OLDBUY01', purchase_date: '2023-12-01T10:00:00Z' },
        ],
      ]
      const cutoff = Date.UTC(2024, 1, 1)

      const asins = await client.getNewlyPurchased(cutoff)

      expect(asins).toEqual(['B0NEWBUY01'])
      expect(state.libraryQueries[1].get('purchased_after')).toBe(
        '2024-02-01T00:00:00.000Z',
      )
    })

    describe('deepScanInProgress', () => {
      const fullPage: AudibleLibraryEntry[] = Array.from(
        { length: 50 },
        (_, i) => ({
          asin: `B0PAGE1${String(i).padStart(3, '0')}`,
          percent_complete: i < 3 ? [10, 50, 99][i] : i % 2 === 0 ? 100 : 0,
        }),
      )

      it('collects partially listened titles across pages', async () => {
        const client = await createReadyClient()
        state.libraryPages = [
          fullPage,
          [
            { asin: 'B0PAGE2001', percent_complete: 42 },
            { asin: 'B0PAGE2002', percent_complete: 100 },
          ],
        ]

        const asins = await client.deepScanInProgress()

        expect(asins).toEqual([
          'B0PAGE1000',
          'B0PAGE1001',
          'B0PAGE1002',
          'B0PAGE2001',
        ])
        expect(
          state.libraryQueries.slice(1).map((query) => query.get('page')),
        ).toEqual(['1', '2'])
      })

      it('stops at the configured maximum', async () => {
        const client = await createReadyClient({ deepScanMaxInProgress: 2 })
        state.libraryPages = [fullPage, fullPage]

        const asins = await client.deepScanInProgress()

        expect(asins).toEqual(['B0PAGE1000', 'B0PAGE1001'])
        expect(state.libraryQueries).toHaveLength(2)
      })

      it('stops after twenty pages', async () => {
        const client = await createReadyClient()
        state.libraryPages = Array.from({ length: 25 }, () => fullPage)

        await client.deepScanInProgress()

        expect(state.libraryQueries).toHaveLength(21)
      })
    })
  })
})
