import type { SortMode, TimeFilter } from '../types';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const TOKEN_ENDPOINT = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';
// refresh a little before Reddit expires the token
const TOKEN_SKEW_MS = 60_000;

/** Subset of a Reddit `t3` thing that the fetcher reads. */
export interface RedditSubmission {
  id: string;
  title: string;
  score: number;
  url: string;
  permalink: string;
  created_utc: number;
  author?: string | null;
  num_comments: number;
  upvote_ratio?: number;
  selftext?: string | null;
  is_video?: boolean;
  over_18?: boolean;
}

export interface ListingOptions {
  limit: number;
  time?: TimeFilter;
}

/** The capability the fetcher depends on; swapped for fakes in tests. */
export interface RedditClient {
  subredditExists(name: string): Promise<boolean>;
  listing(name: string, sort: SortMode, options: ListingOptions): Promise<RedditSubmission[]>;
}

export interface RedditApiClientOptions {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
  now?: () => number;
}

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
}

interface ListingResponse {
  kind?: string;
  data?: {
    children?: Array<{ kind: string; data: RedditSubmission }>;
  };
}

interface AboutResponse {
  kind?: string;
}

export class RedditApiClient implements RedditClient {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(options: RedditApiClientOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.userAgent = options.userAgent;
    this.now = options.now ?? Date.now;

    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  async subredditExists(name: string): Promise<boolean> {
    const res = await this.get(`/r/${encodeURIComponent(name)}/about`, new URLSearchParams({ raw_json: '1' }));
    if (res.status === 404 || res.status === 403) return false;
    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new Error(`Reddit about call failed: ${res.status} ${res.statusText}${detail}`);
    }
    const payload = (await res.json()) as AboutResponse;
    return payload.kind === 't5';
  }

  async listing(name: string, sort: SortMode, options: ListingOptions): Promise<RedditSubmission[]> {
    const qs = new URLSearchParams({ limit: String(options.limit), raw_json: '1' });
    if (options.time) qs.set('t', options.time);

    const res = await this.get(`/r/${encodeURIComponent(name)}/${sort}`, qs);
    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new Error(`Reddit listing call failed: ${res.status} ${res.statusText}${detail}`);
    }

    const payload = (await res.json()) as ListingResponse;
    const children = payload.data?.children;
    if (!Array.isArray(children)) {
      throw new Error('Reddit listing response malformed');
    }
    return children.filter((child) => child.kind === 't3').map((child) => child.data);
  }

  private async get(path: string, qs: URLSearchParams): Promise<Response> {
    const token = await this.accessToken();
    return this.fetchImpl(`${API_BASE}${path}?${qs.toString()}`, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${token}`,
        'User-Agent': this.userAgent,
      },
    });
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.value;
    if (!this.clientId || !this.clientSecret) {
      throw new Error('REDDIT_CLIENT_ID / REDDIT_CLIENT_SECRET are not configured');
    }

    const basic = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString('base64');
    const res = await this.fetchImpl(TOKEN_ENDPOINT, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.userAgent,
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });

    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new Error(`Reddit auth failed: ${res.status} ${res.statusText}${detail}`);
    }

    const payload = (await res.json()) as TokenResponse;
    if (!payload.access_token) {
      throw new Error('Reddit auth response missing access_token');
    }

    const ttlMs = (payload.expires_in ?? 3600) * 1000;
    this.token = {
      value: payload.access_token,
      expiresAt: this.now() + Math.max(0, ttlMs - TOKEN_SKEW_MS),
    };
    return this.token.value;
  }
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
