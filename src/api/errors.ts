/**
 * Errors raised by the filter service client
 */

/**
 * Error class for failed requests to the filter service
 *
 * `status` is the HTTP status, or 0 when the request never got a response.
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly url: string;

  constructor(message: string, status: number, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ApiRequestError';
    this.status = status;
    this.url = url;
  }

  /**
   * Check if this error is a server error
   */
  isServerError(): boolean {
    return this.status >= 500;
  }
}
