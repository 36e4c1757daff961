/**
 * HTTP capability over the Fetch API.
 */

import {
  describeError,
  type HttpClient,
  HttpError,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type IoLogger,
} from "@quarry/io";

export interface FetchHttpClientOptions {
  /** Custom fetch function (for testing or different environments) */
  fetchFn?: typeof fetch;
  /** Headers sent with every request; the request's own headers win */
  defaultHeaders?: HttpHeaders;
  logger?: IoLogger;
}

/** Methods whose requests carry no body */
const BODILESS_METHODS = new Set(["GET", "HEAD"]);

export class FetchHttpClient implements HttpClient {
  private readonly fetchFn: typeof fetch;
  private readonly defaultHeaders: HttpHeaders;
  private readonly logger?: IoLogger;

  constructor(options: FetchHttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.logger = options.logger;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const method = request.method.toUpperCase();
    const { uri } = request;
    const bodiless = BODILESS_METHODS.has(method);
    if (bodiless && request.body.length > 0) {
      throw new HttpError({ method, uri, cause: `${method} requests cannot carry a body` });
    }
    this.logger?.debug?.("sending HTTP request", { method, uri });

    try {
      const response = await this.fetchFn(uri, {
        method,
        headers: this.buildHeaders(request.headers),
        body: bodiless ? undefined : request.body,
        signal: request.signal,
      });

      const headers = collectHeaders(response.headers);
      const body = new Uint8Array(await response.arrayBuffer());

      this.logger?.debug?.("received HTTP response", {
        method,
        uri,
        status: response.status,
        size: body.length,
      });
      return { status: response.status, headers, body };
    } catch (error) {
      this.logger?.error?.("HTTP request failed", { method, uri, error });
      throw new HttpError({ method, uri, cause: describeError(error) });
    }
  }

  private buildHeaders(own: HttpHeaders): Headers {
    const headers = new Headers(this.defaultHeaders);
    for (const [name, value] of Object.entries(own)) {
      headers.set(name, value);
    }
    return headers;
  }
}

/**
 * Lower-cased header map of a response. Repeated fields (`set-cookie` is
 * the one `Headers` yields separately) are joined with ", ".
 */
function collectHeaders(source: Headers): HttpHeaders {
  const headers: HttpHeaders = {};
  source.forEach((value, name) => {
    const key = name.toLowerCase();
    const previous: string | undefined = headers[key];
    headers[key] = previous === undefined ? value : `${previous}, ${value}`;
  });
  return headers;
}
