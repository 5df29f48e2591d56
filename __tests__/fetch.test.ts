jest.mock('undici', () => require('../__mocks__/undici'))
import { request as mockRequest, mockResponse } from '../__mocks__/undici'
import { FetchError } from '../src/errors'
import { fetchReleasePage } from '../src/fetch'

const URL = 'https://musicbrainz.org/release/00000000-0000-0000-0000-000000000001'

describe('fetchReleasePage', () => {
  beforeEach(() => mockRequest.mockClear())

  it('returns the markup of a 200 response', async () => {
    mockRequest.mockResolvedValueOnce(mockResponse(200, '<h1>ok</h1>'))

    await expect(fetchReleasePage(URL)).resolves.toBe('<h1>ok</h1>')
    expect(mockRequest).toHaveBeenCalledWith(URL, {
      headers: { 'User-Agent': 'Mozilla/5.0' },
      headersTimeout: 20000,
      bodyTimeout: 20000,
      maxRedirections: 5,
    })
  })

  it('passes the configured timeout', async () => {
    await fetchReleasePage(URL, { timeoutMs: 5000 })
    expect(mockRequest).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({ headersTimeout: 5000, bodyTimeout: 5000 })
    )
  })

  it('follows redirects such as http to https or merged releases', async () => {
    await fetchReleasePage(URL.replace('https:', 'http:'))
    expect(mockRequest).toHaveBeenCalledWith(
      'http://musicbrainz.org/release/00000000-0000-0000-0000-000000000001',
      expect.objectContaining({ maxRedirections: 5 })
    )
  })

  it('fails on any other status', async () => {
    mockRequest.mockResolvedValueOnce(mockResponse(404, 'not found'))

    const error = await fetchReleasePage(URL).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(FetchError)
    expect(error).toMatchObject({
      code: 'FETCH_FAILED',
      url: URL,
      statusCode: 404,
      message: 'Failed to fetch page: 404',
    })
  })

  it('wraps transport errors', async () => {
    const cause = new Error('getaddrinfo ENOTFOUND musicbrainz.org')
    mockRequest.mockRejectedValueOnce(cause)

    const error = await fetchReleasePage(URL).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(FetchError)
    expect(error).toMatchObject({ statusCode: undefined, cause })
  })
})
