import { HttpResponse, http } from 'msw'

export const AUDIBLE_API = 'https://api.audible.com'
export const AMAZON_AUTH = 'https://api.amazon.com'

export interface AudibleLibraryEntry {
  asin?: string
  title?: string
  percent_complete?: number
  purchase_date?: string
}

export interface AudibleApiState {
  /** Positions served by lastpositions, keyed by ASIN */
  positions: Record<string, number>
  /** Library pages, page 1 first */
  libraryPages: Array<Array<AudibleLibraryEntry>>
  /** Bodies received by the position PUT endpoint */
  updates: Array<{ asin: string; body: unknown }>
  /** Query strings received by the library endpoint */
  libraryQueries: URLSearchParams[]
  /** `asins` parameter of every lastpositions request */
  positionQueries: string[]
  /** Authorization headers seen, in order */
  authHeaders: string[]
  /** Access token the API accepts */
  validToken: string
}

export function createAudibleApiState(
  overrides: Partial<AudibleApiState> = {},
): AudibleApiState {
  return {
    positions: {},
    libraryPages: [[]],
    updates: [],
    libraryQueries: [],
    positionQueries: [],
    authHeaders: [],
    validToken: 'test-access-token',
    ...overrides,
  }
}

function authorized(request: Request, state: AudibleApiState): boolean {
  const header = request.headers.get('authorization') ?? ''
  state.authHeaders.push(header)
  return header === `Bearer ${state.validToken}`
}

/**
 * In-process stand-in for the parts of the Audible API the client uses.
 */
export function createAudibleApiHandlers(state: AudibleApiState) {
  return [
    http.get(`${AUDIBLE_API}/1.0/library`, ({ request }) => {
      if (!authorized(request, state)) {
        return HttpResponse.json({ message: 'Unauthorized' }, { status: 401 })
      }
      const params = new URL(request.url).searchParams
      state.libraryQueries.push(params)
      const page = Number(params.get('page') ?? '1')
      return HttpResponse.json({ items: state.libraryPages[page - 1] ?? [] })
    }),

    http.get(`${AUDIBLE_API}/1.0/annotations/lastpositions`, ({ request }) => {
      if (!authorized(request, state)) {
        return HttpResponse.json({ message: 'Unauthorized' }, { status: 401 })
      }
      const requested = new URL(request.url).searchParams.get('asins') ?? ''
      state.positionQueries.push(requested)
      const asins = requested
        .split(',')
        .filter((asin) => asin in state.positions)
      return HttpResponse.json({
        asin_last_position_heard_annots: asins.map((asin) => ({
          asin,
          last_position_heard: {
            position_ms: state.positions[asin],
            last_updated: '2024-03-01 18:22:05.000',
            status: 'Exists',
          },
        })),
      })
    }),

    http.put(
      `${AUDIBLE_API}/1.0/lastpositions/:asin`,
      async ({ request, params }) => {
        if (!authorized(request, state)) {
          return HttpResponse.json(
            { message: 'Unauthorized' },
            { status: 401 },
          )
        }
        state.updates.push({
          asin: String(params.asin),
          body: await request.json(),
        })
        return new HttpResponse(null, { status: 204 })
      },
    ),

    http.post(`${AMAZON_AUTH}/auth/token`, async ({ request }) => {
      const form = new URLSearchParams(await request.text())
      if (form.get('source_token') !== 'test-refresh-token') {
        return HttpResponse.json(
          { error: 'invalid_grant', error_description: 'Bad refresh token' },
          { status: 400 },
        )
      }
      state.validToken = 'test-refreshed-token'
      return HttpResponse.json({
        access_token: 'test-refreshed-token',
        expires_in: 3600,
      })
    }),
  ]
}
