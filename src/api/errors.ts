/**
 * Logging in to, or bootstrapping from, a Protect controller failed.
 */
export class ProtectApiError extends Error {
  public readonly address: string;
  public readonly statusCode?: number;

  constructor(message: string, address: string, statusCode?: number) {
    super(message);
    this.name = 'ProtectApiError';
    this.address = address;
    this.statusCode = statusCode;
  }

  /** Credentials were refused; retrying with the same configuration will not help. */
  public get isAuthError(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}
