// tests/dexscreener.test.ts
jest.setTimeout(20000)

import nock from 'nock'
nock.disableNetConnect()

import { fetchTokenPairs, fetchTokenProfiles } from '../src/services/dexscreener'
import { createHttpClient } from '../src/http/axiosClient'

const HOST = 'https://feeds.dexscreener.test'
const PROFILES_PATH = '/token-profiles/latest/v1'
const client = createHttpClient({ retries: 0 })
const feed = { client, url: `${HOST}${PROFILES_PATH}`, chain: 'solana' }
const pairsFeed = { client, url: `${HOST}/token-pairs/v1`, chain: 'solana' }

describe('dexscreener feeds', () => {
  let errorSpy: jest.SpyInstance
  let logSpy: jest.SpyInstance

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    errorSpy.mockRestore()
    logSpy.mockRestore()
    nock.cleanAll()
  })

  afterAll(() => {
    nock.enableNetConnect()
  })

  test('fetchTokenProfiles keeps only profiles on the target chain', async () => {
    nock(HOST)
      .get(PROFILES_PATH)
      .reply(200, [
        { chainId: 'solana', tokenAddress: 'SOL1', url: 'https://dexscreener.com/solana/sol1' },
        { chainId: 'base', tokenAddress: '0xabc' },
        'junk',
        { chainId: 'solana', tokenAddress: 'SOL2', links: [{ type: 'twitter', url: 'https://x.com/sol2' }] }
      ])

    const profiles = await fetchTokenProfiles(feed)
    expect(profiles.map((p) => p.tokenAddress)).toEqual(['SOL1', 'SOL2'])
    expect(profiles[1].links).toEqual([{ type: 'twitter', label: undefined, url: 'https://x.com/sol2' }])
  })

  test('an HTTP 500 yields no profiles', async () => {
    nock(HOST).get(PROFILES_PATH).reply(500, { error: 'boom' })
    await expect(fetchTokenProfiles(feed)).resolves.toEqual([])
    expect(errorSpy).toHaveBeenCalledWith('fetchTokenProfiles error', 'HTTP 500 - {"error":"boom"}')
  })

  test('a non-list body yields no profiles', async () => {
    nock(HOST).get(PROFILES_PATH).reply(200, { profiles: [] })
    await expect(fetchTokenProfiles(feed)).resolves.toEqual([])
  })

  test('malformed JSON yields no profiles', async () => {
    nock(HOST).get(PROFILES_PATH).reply(200, '[{"chainId":', { 'Content-Type': 'application/json' })
    await expect(fetchTokenProfiles(feed)).resolves.toEqual([])
  })

  test('fetchTokenPairs wraps a list response', async () => {
    nock(HOST)
      .get('/token-pairs/v1/solana/SOL1')
      .reply(200, [{ pairAddress: 'P1', liquidity: { usd: 12000 } }, { pairAddress: 'P2' }])

    const details = await fetchTokenPairs('SOL1', pairsFeed)
    expect(details?.pairs.map((p) => p.pairAddress)).toEqual(['P1', 'P2'])
    expect(details?.pairs[0].liquidity.usd).toBe(12000)
  })

  test('fetchTokenPairs accepts { pairs } and single-pair objects', async () => {
    nock(HOST)
      .get('/token-pairs/v1/solana/SOL1')
      .reply(200, { pairs: [{ pairAddress: 'P1' }] })
      .get('/token-pairs/v1/solana/SOL2')
      .reply(200, { pairAddress: 'ONLY', liquidity: { usd: '700' } })

    expect((await fetchTokenPairs('SOL1', pairsFeed))?.pairs.map((p) => p.pairAddress)).toEqual(['P1'])
    const single = await fetchTokenPairs('SOL2', pairsFeed)
    expect(single?.pairs).toHaveLength(1)
    expect(single?.pairs[0].liquidity.usd).toBe(700)
  })

  test('fetchTokenPairs returns null for empty bodies, bad JSON and errors', async () => {
    nock(HOST)
      .get('/token-pairs/v1/solana/EMPTY')
      .reply(200, '')
      .get('/token-pairs/v1/solana/BAD')
      .reply(200, 'not json')
      .get('/token-pairs/v1/solana/SCALAR')
      .reply(200, '42')
      .get('/token-pairs/v1/solana/GONE')
      .reply(404, 'not found')

    await expect(fetchTokenPairs('EMPTY', pairsFeed)).resolves.toBeNull()
    await expect(fetchTokenPairs('BAD', pairsFeed)).resolves.toBeNull()
    await expect(fetchTokenPairs('SCALAR', pairsFeed)).resolves.toBeNull()
    await expect(fetchTokenPairs('GONE', pairsFeed)).resolves.toBeNull()
  })

  test('server errors on GET are retried', async () => {
    const retrying = createHttpClient({ retries: 1 })
    nock(HOST)
      .get('/token-pairs/v1/solana/SOL1')
      .reply(502, 'bad gateway')
      .get('/token-pairs/v1/solana/SOL1')
      .reply(200, [{ pairAddress: 'P1' }])

    const details = await fetchTokenPairs('SOL1', { ...pairsFeed, client: retrying })
    expect(details?.pairs.map((p) => p.pairAddress)).toEqual(['P1'])
  })
})
