/**
 * HTTP capability.
 *
 * The one asynchronous operation of the I/O layer. It defines no timeout and
 * no retries: callers impose a deadline through `signal` and retry if they
 * need to.
 */

export type HttpHeaders = Record<string, string>;

export interface HttpRequest {
  method: string;
  uri: string;
  headers: HttpHeaders;
  body: Uint8Array;
  /** Cancellation imposed by the caller */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-case */
  headers: HttpHeaders;
  body: Uint8Array;
}

export interface HttpClient {
  /**
   * Send `request` and wait for the complete response.
   * @throws HttpError when no response could be obtained
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}
