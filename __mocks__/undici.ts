type MockBody = { text: () => Promise<string>; dump: () => Promise<void> }
type MockResponse = { statusCode: number; body: MockBody }

export function mockResponse(statusCode: number, bodyText = ''): MockResponse {
  return {
    statusCode,
    body: {
      text: async () => bodyText,
      dump: async () => undefined,
    },
  }
}

export const request = jest.fn(
  async (_url: string, _init?: unknown): Promise<MockResponse> =>
    mockResponse(200, '<html></html>')
)
