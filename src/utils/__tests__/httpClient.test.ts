import http from 'http';
import type { AddressInfo } from 'net';
import { AxiosError, AxiosHeaders } from 'axios';
import { isTransientError } from '../httpClient';

jest.mock('../logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  },
}));

interface SequencedResponse {
  status: number;
  body?: unknown;
}

/** Answers the nth request with the nth response, repeating the last one */
async function startSequenceServer(responses: SequencedResponse[]) {
  let requestCount = 0;
  const server = http.createServer((_req, res) => {
    const response = responses[Math.min(requestCount, responses.length - 1)];
    requestCount += 1;
    res.writeHead(response.status, { 'content-type': 'application/json' });
    res.end(JSON.stringify(response.body ?? {}));
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address() as AddressInfo;
  const url = `http://127.0.0.1:${address.port}`;

  return {
    url,
    getRequestCount: () => requestCount,
    close: async () => new Promise<void>((resolve) => {
      server.close(() => resolve());
    }),
  };
}

describe('httpClient', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv };
    process.env.HTTP_CLIENT_TIMEOUT_MS = '2000';
    process.env.HTTP_CLIENT_RETRY_DELAY_MS = '10';
    process.env.HTTP_CLIENT_MAX_RETRIES = '2';
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('retries transient failures and succeeds on a later attempt', async () => {
    const server = await startSequenceServer([
      { status: 503, body: { error: 'temporary' } },
      { status: 200, body: [{ icao: '0d086e' }] },
    ]);
    const httpClient = (await import('../httpClient')).default;

    try {
      const response = await httpClient.get(`${server.url}/aircraft.json`);
      expect(response.data).toEqual([{ icao: '0d086e' }]);
      expect(server.getRequestCount()).toBe(2);
    } finally {
      await server.close();
    }
  });

  it('gives up after the configured number of retries', async () => {
    const server = await startSequenceServer([{ status: 500, body: { error: 'down' } }]);
    const httpClient = (await import('../httpClient')).default;

    try {
      await expect(httpClient.get(`${server.url}/aircraft.json`)).rejects.toThrow();
      expect(server.getRequestCount()).toBe(3);
    } finally {
      await server.close();
    }
  });

  it('honors retry:false and does not retry failed requests', async () => {
    const server = await startSequenceServer([{ status: 500, body: { error: 'temporary' } }]);
    const httpClient = (await import('../httpClient')).default;

    try {
      await expect(httpClient.get(`${server.url}/no-retry`, { retry: false })).rejects.toThrow();
      expect(server.getRequestCount()).toBe(1);
    } finally {
      await server.close();
    }
  });

  it('does not retry client errors', async () => {
    const server = await startSequenceServer([{ status: 404 }]);
    const httpClient = (await import('../httpClient')).default;

    try {
      await expect(httpClient.get(`${server.url}/missing`)).rejects.toThrow();
      expect(server.getRequestCount()).toBe(1);
    } finally {
      await server.close();
    }
  });
});

describe('isTransientError', () => {
  const responseError = (status: number): AxiosError => new AxiosError(
    `Request failed with status code ${status}`,
    undefined,
    undefined,
    undefined,
    {
      status,
      statusText: '',
      headers: {},
      config: { headers: new AxiosHeaders() },
      data: null,
    },
  );

  it('treats connection failures and server errors as transient', () => {
    expect(isTransientError(new AxiosError('reset', 'ECONNRESET'))).toBe(true);
    expect(isTransientError(new AxiosError('timeout', 'ECONNABORTED'))).toBe(true);
    expect(isTransientError(responseError(502))).toBe(true);
  });

  it('treats client errors and unknown failures as permanent', () => {
    expect(isTransientError(responseError(404))).toBe(false);
    expect(isTransientError(new AxiosError('refused', 'ECONNREFUSED'))).toBe(false);
  });
});
