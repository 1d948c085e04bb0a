import {
  AudiobookshelfClient,
  type AudiobookshelfClientOptions,
} from '@services/audiobookshelf.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import {
  ABS_TOKEN,
  ABS_URL,
  type AudiobookshelfApiState,
  createAudiobookshelfApiHandlers,
  createAudiobookshelfApiState,
} from '../../mocks/audiobookshelf-api-handlers.js'
import { createMockLogger } from '../../mocks/logger.js'
import { server } from '../../setup/msw-setup.js'

const UPDATED_AT = Date.UTC(2024, 4, 20, 19, 45)

describe('AudiobookshelfClient', () => {
  let state: AudiobookshelfApiState
  let logger: FastifyBaseLogger

  const createReadyClient = async (
    overrides: Partial<AudiobookshelfClientOptions> = {},
  ) => {
    const client = new AudiobookshelfClient(logger, {
      baseUrl: ABS_URL,
      token: ABS_TOKEN,
      userId: '',
      libraryId: '',
      requestTimeoutMs: 5_000,
      dryRun: false,
      ...overrides,
    })
    await client.initialize()
    return client
  }

  beforeEach(() => {
    state = createAudiobookshelfApiState({
      libraries: ['lib-books', 'lib-podcasts'],
      items: {
        'lib-books': [
          { id: 'li-dune', asin: 'B0DUNE0001', title: 'Dune' },
          { id: 'li-emma', asin: 'B0EMMA0001', title: 'Emma' },
          { id: 'li-done', asin: 'B0DONE0001', title: 'Finished' },
        ],
        'lib-podcasts': [
          { id: 'li-cast', asin: 'B0CAST0001', title: 'A Podcast' },
        ],
      },
      progress: {
        'li-dune': {
          libraryItemId: 'li-dune',
          currentTime: 1_800.25,
          duration: 75_600,
          lastUpdate: UPDATED_AT,
        },
        'li-done': {
          libraryItemId: 'li-done',
          currentTime: 36_000,
          isFinished: true,
          lastUpdate: UPDATED_AT,
        },
      },
    })
    logger = createMockLogger()
    server.use(...createAudiobookshelfApiHandlers(state))
  })

  describe('initialize', () => {
    it('becomes ready with a valid token', async () => {
      const client = await createReadyClient()

      expect(client.isReady()).toBe(true)
      expect(logger.info).toHaveBeenCalledWith(
        'Connected to Audiobookshelf as user user-1',
      )
    })

    it('stays not ready without a URL or token', async () => {
      const client = await createReadyClient({ token: '' })

      expect(client.isReady()).toBe(false)
      expect(await client.getInProgress()).toEqual(new Map())
      expect(await client.resolveItemId('B0DUNE0001')).toBeNull()
      expect(await client.updateProgress('li-dune', 10)).toBe(false)
    })

    it('stays not ready when the token is rejected', async () => {
      const client = await createReadyClient({ token: 'test-wrong-token' })

      expect(client.isReady()).toBe(false)
    })
  })

  describe('getInProgress', () => {
    it('maps unfinished progress by ASIN', async () => {
      const client = await createReadyClient()

      const items = await client.getInProgress()

      expect(items).toEqual(
        new Map([
          [
            'B0DUNE0001',
            {
              asin: 'B0DUNE0001',
              itemId: 'li-dune',
              positionSeconds: 1_800.25,
              durationSeconds: 75_600,
              updatedAt: UPDATED_AT,
            },
          ],
        ]),
      )
    })

    it('accepts the older response that wraps the user', async () => {
      server.use(
        http.get(`${ABS_URL}/api/me`, () =>
          HttpResponse.json({
            user: {
              id: 'user-legacy',
              mediaProgress: [
                {
                  libraryItemId: 'li-emma',
                  currentTime: 42,
                  media: { metadata: { asin: 'B0EMMA0001' } },
                },
              ],
            },
          }),
        ),
      )
      const client = await createReadyClient()

      const items = await client.getInProgress()

      expect(items.get('B0EMMA0001')).toEqual({
        asin: 'B0EMMA0001',
        itemId: 'li-emma',
        positionSeconds: 42,
        durationSeconds: undefined,
        updatedAt: 0,
      })
    })
  })

  describe('resolveItemId', () => {
    it('answers from the in-progress listing without searching', async () => {
      const client = await createReadyClient()
      await client.getInProgress()

      expect(await client.resolveItemId('B0DUNE0001')).toBe('li-dune')
      expect(state.searches).toEqual([])
    })

    it('searches every library until the ASIN matches', async () => {
      const client = await createReadyClient()

      expect(await client.resolveItemId('B0CAST0001')).toBe('li-cast')
      expect(state.searches).toEqual([
        { libraryId: 'lib-books', query: 'B0CAST0001' },
        { libraryId: 'lib-podcasts', query: 'B0CAST0001' },
      ])

      expect(await client.resolveItemId('B0CAST0001')).toBe('li-cast')
      expect(state.searches).toHaveLength(2)
    })

    it('searches only the configured library', async () => {
      const client = await createReadyClient({ libraryId: 'lib-books' })

      expect(await client.resolveItemId('B0CAST0001')).toBeNull()
      expect(state.searches).toEqual([
        { libraryId: 'lib-books', query: 'B0CAST0001' },
      ])
    })
  })

  describe('getItemProgress', () => {
    it('returns the progress of one item', async () => {
      const client = await createReadyClient()

      expect(await client.getItemProgress('li-dune')).toEqual({
        positionSeconds: 1_800.25,
        durationSeconds: 75_600,
        updatedAt: UPDATED_AT,
        isFinished: false,
      })
    })

    it('returns null when the item has no progress', async () => {
      const client = await createReadyClient()

      expect(await client.getItemProgress('li-emma')).toBeNull()
      expect(logger.error).not.toHaveBeenCalled()
    })
  })

  describe('updateProgress', () => {
    it('patches the new position', async () => {
      const client = await createReadyClient()

      expect(await client.updateProgress('li-emma', 615.5)).toBe(true)

      expect(state.patches).toEqual([
        { itemId: 'li-emma', body: { currentTime: 615.5, isFinished: false } },
      ])
    })

    it('only logs in dry-run mode', async () => {
      const client = await createReadyClient({ dryRun: true })

      expect(await client.updateProgress('li-emma', 615.5)).toBe(true)

      expect(state.patches).toEqual([])
      expect(logger.info).toHaveBeenCalledWith(
        '[DRY RUN] Would set Audiobookshelf progress for li-emma to 615.5s',
      )
    })

    it('reports a failed update', async () => {
      const client = await createReadyClient()
      server.use(
        http.patch(
          `${ABS_URL}/api/me/progress/:itemId`,
          () => new HttpResponse('Internal Server Error', { status: 500 }),
        ),
      )

      expect(await client.updateProgress('li-emma', 615.5)).toBe(false)
    })
  })
})
