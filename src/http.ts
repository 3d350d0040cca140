import axios, { AxiosInstance } from 'axios';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36';

export interface HttpRequestOptions {
  readonly headers?: Record<string, string>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly status: number;
  /** Final URL after redirects. */
  readonly url: string;
  /** Lower-cased header names. */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/**
 * Text-only GET client. Non-2xx statuses resolve; only transport failures reject.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

const normalizeHeaders = (raw: object): Record<string, string> => {
  const headers: Record<string, string> = {};
  const entries: [string, unknown][] = Object.entries(raw);
  for (const [name, value] of entries) {
    if (typeof value === 'string') {
      headers[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number') {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return headers;
};

/**
 * Node's http adapter exposes the post-redirect URL on the underlying response.
 */
const finalUrlOf = (request: unknown, fallback: string): string => {
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const { res } = request;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
};

export interface BrowserClientOptions {
  readonly referer: string;
  readonly timeoutMs: number;
  readonly instance?: AxiosInstance;
}

/**
 * Creates an axios-backed client that presents itself like an ordinary browser visit.
 */
export const createHttpClient = ({ referer, timeoutMs, instance }: BrowserClientOptions): HttpClient => {
  const client =
    instance ??
    axios.create({
      headers: {
        'User-Agent': BROWSER_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        Referer: referer,
      },
      maxRedirects: 5,
    });

  return {
    get: async (url, options = {}) => {
      const response = await client.get<string>(url, {
        headers: options.headers,
        timeout: options.timeoutMs ?? timeoutMs,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      const request: unknown = response.request;
      return {
        status: response.status,
        url: finalUrlOf(request, url),
        headers: normalizeHeaders(response.headers),
        body: response.data ?? '',
      };
    },
  };
};
