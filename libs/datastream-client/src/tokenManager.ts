import type {
  Clock,
  Credential,
  DswsTokenRequest,
  HttpTransport,
  Logger,
  OutboundRequest,
  Token,
  TokenManagerConfig,
} from './types';
import { AuthenticationError, ServiceUnavailableError } from './types';
import { tokenResponseSchema, type DswsTokenResponse } from './schemas';
import { parseDswsDate, toIsoDate } from './dates';
import {
  DEFAULT_TIMEOUT_MS,
  defaultTransport,
  executeHttp,
  isTransientStatus,
  safeReadBody,
} from './http';

export const DEFAULT_TOKEN_URL =
  'https://product.datastream.com/dswsclient/V1/DSService.svc/rest/GetToken';
const DEFAULT_EXPIRY_SKEW_MS = 5 * 60 * 1000;

/**
 * Token Manager
 *
 * Owns the access token lifecycle for one credential:
 * - exchanges the credential for a token at the token endpoint
 * - hands out the held token until it expires, then re-authenticates once
 * - stamps outbound requests with a bearer header
 *
 * Tokens are frozen and replaced by reference, so a caller sees either the
 * old token or the new one.
 */
export class TokenManager {
  private readonly tokenUrl: string;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly expirySkewMs: number;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private credential?: Credential;
  private token?: Token;
  private pending?: Promise<Token>;
  // Bumped on logout so a late token response cannot revive the session.
  private generation = 0;

  constructor(config: TokenManagerConfig = {}) {
    this.tokenUrl = config.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.transport = config.transport ?? defaultTransport;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.expirySkewMs = config.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
    this.credential = config.credential ? freezeCredential(config.credential) : undefined;
  }

  get currentToken(): Token | undefined {
    return this.token;
  }

  /**
   * Exchange a credential for a new token.
   *
   * Without an argument the stored credential is used. On success the
   * credential becomes the stored one and any previous token is discarded.
   * Rejected credentials also discard the held token; transport failures
   * leave it untouched.
   */
  async authenticate(credential?: Credential): Promise<Token> {
    const effective = credential ?? this.credential;
    if (!effective) {
      throw new AuthenticationError('No credential available for authentication');
    }

    const generation = this.generation;
    const payload: DswsTokenRequest = {
      UserName: effective.username,
      Password: effective.password,
      Properties: null,
    };

    this.logger?.debug?.('[TokenManager] Requesting access token', { tokenUrl: this.tokenUrl });

    const response = await executeHttp(
      this.transport,
      this.tokenUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
      },
      this.timeoutMs,
    );

    const body = await safeReadBody(response);

    if (!response.ok) {
      if (isTransientStatus(response.status)) {
        this.logger?.warn?.(
          `[TokenManager] Token endpoint unavailable (status ${response.status})`,
        );
        throw new ServiceUnavailableError(
          `Token request failed with status ${response.status}`,
          response.status,
          body,
        );
      }
      if (generation === this.generation) {
        this.token = undefined;
      }
      this.logger?.warn?.(`[TokenManager] Credentials rejected (status ${response.status})`);
      throw new AuthenticationError(
        `Token request rejected with status ${response.status}`,
        response.status,
        body,
      );
    }

    const parsed = parseTokenPayload(body);
    if (!parsed) {
      throw new ServiceUnavailableError(
        'Token endpoint returned a malformed response',
        response.status,
      );
    }

    const issuedAt = this.now();
    let expiresAt = parseDswsDate(parsed.TokenExpiry) ?? undefined;
    // The expiry is server time; a local clock running ahead can put it in the past.
    if (expiresAt !== undefined && expiresAt <= issuedAt) {
      this.logger?.warn?.(
        '[TokenManager] Token expiry is not after the local clock; keeping the token until it is rejected',
        { expiresAt: new Date(expiresAt).toISOString(), issuedAt: new Date(issuedAt).toISOString() },
      );
      expiresAt = undefined;
    }
    const token: Token = Object.freeze(
      expiresAt === undefined
        ? { value: parsed.TokenValue, issuedAt }
        : { value: parsed.TokenValue, issuedAt, expiresAt },
    );

    if (generation !== this.generation) {
      throw new AuthenticationError('Session was logged out while authenticating');
    }

    this.token = token;
    this.credential = freezeCredential(effective);

    this.logger?.info?.('[TokenManager] Access token issued', {
      expiresAt: expiresAt === undefined ? 'unknown' : new Date(expiresAt).toISOString(),
    });

    return token;
  }

  /**
   * Return the held token while it is valid, otherwise authenticate once with
   * the stored credential. Concurrent callers share one authentication.
   */
  async getValidToken(): Promise<Token> {
    const current = this.token;
    if (current && !this.isExpired(current)) {
      return current;
    }

    if (this.pending) {
      return this.pending;
    }

    if (current) {
      this.logger?.debug?.(
        `[TokenManager] Token expired${current.expiresAt ? ` at ${toIsoDate(current.expiresAt)}` : ''}; re-authenticating`,
      );
    }

    const attempt = this.authenticate();
    this.pending = attempt;
    const clear = () => {
      if (this.pending === attempt) {
        this.pending = undefined;
      }
    };
    attempt.then(clear, clear);
    return attempt;
  }

  /**
   * Return a copy of `request` carrying the held token as a bearer header.
   * Never authenticates; throws when no usable token is held.
   */
  authorize(request: OutboundRequest): OutboundRequest {
    const token = this.token;
    if (!token) {
      throw new AuthenticationError('Not authenticated; obtain a token with getValidToken() first');
    }
    if (this.isExpired(token)) {
      throw new AuthenticationError('Access token has expired; obtain a new one with getValidToken()');
    }
    return {
      ...request,
      headers: {
        ...request.headers,
        Authorization: `Bearer ${token.value}`,
      },
    };
  }

  /**
   * Drop the held token, e.g. after the service rejected it. When `token` is
   * given, only that token is dropped; a newer one stays.
   */
  invalidate(token?: Token): void {
    if (token === undefined || this.token === token) {
      this.token = undefined;
    }
  }

  logout(): void {
    this.generation += 1;
    this.token = undefined;
    this.pending = undefined;
  }

  isExpired(token: Token): boolean {
    if (token.expiresAt === undefined) {
      return false;
    }
    const lifetime = Math.max(0, token.expiresAt - token.issuedAt);
    const skew = Math.min(this.expirySkewMs, lifetime / 2);
    return this.now() >= token.expiresAt - skew;
  }
}

function freezeCredential(credential: Credential): Credential {
  return Object.freeze({ username: credential.username, password: credential.password });
}

/**
 * Older DSWS deployments wrap the token JSON in a JSON string, so a string
 * result is decoded a second time.
 */
function parseTokenPayload(body: string | undefined): DswsTokenResponse | null {
  if (!body?.trim()) {
    return null;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
    if (typeof decoded === 'string') {
      decoded = JSON.parse(decoded);
    }
  } catch {
    return null;
  }
  const result = tokenResponseSchema.safeParse(decoded);
  return result.success ? result.data : null;
}
