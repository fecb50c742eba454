import { ProviderNotConfiguredError } from './retry.js';

export const IAM_TOKEN_URL = 'https://iam.cloud.ibm.com/identity/token';

/** Tokens are refreshed this long before they expire. */
const REFRESH_MARGIN_SECONDS = 60;

interface CachedToken {
  accessToken: string;
  /** Epoch seconds. */
  expiresAt: number;
}

/**
 * Exchanges an IBM Cloud API key for IAM bearer tokens and caches the
 * token until shortly before it expires.
 */
export class IamTokenSource {
  private readonly apiKey: string;
  private readonly tokenUrl: string;
  private cached: CachedToken | null = null;
  private pending: Promise<CachedToken> | null = null;

  constructor(apiKey: string, tokenUrl: string = IAM_TOKEN_URL) {
    this.apiKey = apiKey.trim();
    this.tokenUrl = tokenUrl;
  }

  async getToken(): Promise<string> {
    if (!this.apiKey) {
      throw new ProviderNotConfiguredError('IBM IAM API key is required.');
    }

    const now = Date.now() / 1000;
    if (this.cached && this.cached.expiresAt - now > REFRESH_MARGIN_SECONDS) {
      return this.cached.accessToken;
    }

    // Concurrent callers share one exchange
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    const token = await this.pending;
    this.cached = token;
    return token.accessToken;
  }

  /** Drop the cached token so the next call performs a fresh exchange. */
  invalidate(): void {
    this.cached = null;
  }

  private async exchange(): Promise<CachedToken> {
    const body = new URLSearchParams({
      grant_type: 'urn:ibm:params:oauth:grant-type:apikey',
      apikey: this.apiKey,
    });

    let response: Response;
    try {
      response = await fetch(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`IBM IAM token request failed: ${message}`);
    }

    if (!response.ok) {
      const detail = (await response.text()).trim() || `HTTP ${response.status}`;
      throw new Error(`IBM IAM token request was rejected (${response.status}): ${detail}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new Error('IBM IAM token response was not valid JSON.');
    }
    if (typeof payload !== 'object' || payload === null) {
      throw new Error('IBM IAM token response was not valid JSON.');
    }

    const accessToken = 'access_token' in payload ? payload.access_token : undefined;
    if (typeof accessToken !== 'string' || !accessToken.trim()) {
      throw new Error('IBM IAM token response did not include a valid access_token.');
    }

    const now = Date.now() / 1000;
    const expiration = 'expiration' in payload ? payload.expiration : undefined;
    const expiresIn = 'expires_in' in payload ? payload.expires_in : undefined;
    let expiresAt: number | undefined;
    if (typeof expiration === 'number') {
      expiresAt = expiration;
    } else if (typeof expiresIn === 'number') {
      expiresAt = now + expiresIn;
    }

    if (expiresAt === undefined || expiresAt <= now) {
      throw new Error('IBM IAM token response did not include a valid expiration time.');
    }

    return { accessToken, expiresAt };
  }
}
