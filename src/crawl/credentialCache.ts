export type LoginFn = () => Promise<string>;

/**
 * Bearer token shared by every caller of one crawl client.
 *
 * Reads return the cached token. At most one login runs at a time; callers that
 * ask for a refresh while one is in flight wait on the same login.
 */
export class CredentialCache {
  private token: string | null = null;
  private refreshing: Promise<string> | null = null;
  private logins = 0;

  constructor(private readonly login: LoginFn) {}

  get loginCount(): number {
    return this.logins;
  }

  async current(): Promise<string> {
    if (this.refreshing) return this.refreshing;
    if (this.token !== null) return this.token;
    return this.refresh(null);
  }

  /**
   * Replace `staleToken`. If the cache already holds a different token, another
   * caller refreshed first and that token is returned without logging in again.
   */
  async refresh(staleToken: string | null): Promise<string> {
    if (this.refreshing) return this.refreshing;
    if (staleToken !== null && this.token !== null && this.token !== staleToken) return this.token;

    this.logins += 1;
    const pending = this.login().then(
      (token) => {
        this.token = token;
        this.refreshing = null;
        return token;
      },
      (err: unknown) => {
        this.refreshing = null;
        throw err;
      }
    );
    this.refreshing = pending;
    return pending;
  }
}
