/**
 * MediaWikiClient - WikiTransport over a live MediaWiki site
 *
 * Rendered pages come from the article path (so links on redirect pages are
 * those of their target), backlinks and redirects from the action API in
 * JSON format version 2. Every request carries a User-Agent and `maxlag`;
 * lag, rate-limit and read-only responses are retried after the advertised
 * delay, network failures and 5xx after a backoff.
 */

import { z } from 'zod';
import { TransportError, toError } from '../../shared/errors.js';
import { computeBackoffMs, sleep as defaultSleep } from '../../shared/backoff.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import { encodeTitle, tryNormalizeTitle } from '../../shared/title.js';
import type { Title } from '../../shared/types.js';
import type { InboundPage, WikiTransport } from './transport.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MediaWikiClientOptions {
  domain: string;
  scriptPath?: string;
  articlePath?: string;
  userAgent: string;
  timeoutMs?: number;
  maxRetries?: number;
  maxLag?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** API error codes that mean "come back later" */
const RETRY_CODES: ReadonlySet<string> = new Set(['maxlag', 'ratelimited', 'readonly']);

/** HTTP statuses worth another attempt */
const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const DEFAULT_RETRY_AFTER_MS = 10_000;

/** Redirect listings longer than this many pages are cut off */
const MAX_REDIRECT_PAGES = 20;

const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    info: z.string().optional(),
  }),
});

const linksHereSchema = z.object({
  continue: z.object({ lhcontinue: z.string().optional() }).passthrough().optional(),
  query: z
    .object({
      pages: z.array(
        z.object({
          title: z.string(),
          linkshere: z.array(z.object({ title: z.string() })).optional(),
        }),
      ),
    })
    .optional(),
});

const redirectsSchema = z.object({
  continue: z.object({ rdcontinue: z.string().optional() }).passthrough().optional(),
  query: z
    .object({
      pages: z.array(
        z.object({
          title: z.string(),
          redirects: z.array(z.object({ title: z.string() })).optional(),
        }),
      ),
    })
    .optional(),
});

type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; error: TransportError; retryAfterMs: number | null };

export class MediaWikiClient implements WikiTransport {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly maxLag: number;

  readonly apiUrl: string;
  private readonly articleBase: string;

  constructor(private readonly options: MediaWikiClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('MediaWiki');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 2);
    this.maxLag = options.maxLag ?? 5;

    const origin = `https://${options.domain}`;
    this.apiUrl = `${origin}${options.scriptPath ?? '/w'}/api.php`;
    this.articleBase = `${origin}${options.articlePath ?? '/wiki'}/`;
  }

  articleUrl(title: Title): string {
    return this.articleBase + encodeTitle(title);
  }

  async fetchRenderedPage(title: Title): Promise<string> {
    return this.request(this.articleUrl(title), async (res) => ({
      ok: true,
      value: await res.text(),
    }));
  }

  async fetchInboundPage(
    title: Title,
    cursor: string | null,
    limit: number,
  ): Promise<InboundPage> {
    const params: Record<string, string> = {
      action: 'query',
      prop: 'linkshere',
      titles: title,
      lhprop: 'title',
      lhnamespace: '0',
      lhshow: '!redirect',
      lhlimit: String(limit),
    };
    if (cursor !== null) {
      params['lhcontinue'] = cursor;
    }

    const data = parseResponse(linksHereSchema, await this.apiCall(params), 'linkshere');
    const titles: Title[] = [];
    for (const page of data.query?.pages ?? []) {
      for (const link of page.linkshere ?? []) {
        const normalized = tryNormalizeTitle(link.title);
        if (normalized !== null) titles.push(normalized);
      }
    }

    return { titles, nextCursor: data.continue?.lhcontinue ?? null };
  }

  async fetchRedirectsTo(title: Title): Promise<Set<Title>> {
    const redirects = new Set<Title>();
    let cursor: string | null = null;

    for (let page = 0; page < MAX_REDIRECT_PAGES; page++) {
      const params: Record<string, string> = {
        action: 'query',
        prop: 'redirects',
        titles: title,
        rdprop: 'title',
        rdnamespace: '0',
        rdlimit: 'max',
      };
      if (cursor !== null) {
        params['rdcontinue'] = cursor;
      }

      const data = parseResponse(redirectsSchema, await this.apiCall(params), 'redirects');
      for (const p of data.query?.pages ?? []) {
        for (const r of p.redirects ?? []) {
          const normalized = tryNormalizeTitle(r.title);
          if (normalized !== null) redirects.add(normalized);
        }
      }

      cursor = data.continue?.rdcontinue ?? null;
      if (cursor === null) break;
    }

    return redirects;
  }

  // --- private ---

  private async apiCall(params: Record<string, string>): Promise<unknown> {
    const search = new URLSearchParams({
      ...params,
      format: 'json',
      formatversion: '2',
      maxlag: String(this.maxLag),
    });
    const url = `${this.apiUrl}?${search.toString()}`;

    return this.request(url, async (res) => {
      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new TransportError(`Malformed JSON from ${url}`, res.status, toError(err));
      }

      const apiError = apiErrorSchema.safeParse(body);
      if (!apiError.success) {
        return { ok: true, value: body };
      }

      const { code, info } = apiError.data.error;
      const error = new TransportError(
        `MediaWiki API error ${code}${info ? `: ${info}` : ''}`,
        res.status,
      );
      if (RETRY_CODES.has(code)) {
        return {
          ok: false,
          error,
          retryAfterMs: retryAfterMs(res) ?? DEFAULT_RETRY_AFTER_MS,
        };
      }
      throw error;
    });
  }

  /**
   * Issue a GET with retries. `read` turns a 2xx response into a value, asks
   * for another attempt, or throws a non-retryable TransportError.
   */
  private async request<T>(
    url: string,
    read: (res: Response) => Promise<Attempt<T>>,
  ): Promise<T> {
    let lastError: Error | null = null;
    let delayMs: number | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const wait = delayMs ?? computeBackoffMs(attempt);
        this.logger.debug(`Retrying in ${wait}ms (attempt ${attempt + 1}): ${url}`);
        await this.sleep(wait);
      }
      delayMs = null;

      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          headers: { 'User-Agent': this.options.userAgent },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        lastError = toError(err);
        this.logger.debug(`Request failed: ${url}`, lastError);
        continue;
      }

      if (RETRY_STATUSES.has(res.status)) {
        lastError = new TransportError(`HTTP ${res.status} from ${url}`, res.status);
        delayMs = retryAfterMs(res);
        // unread bodies hold the connection
        await res.body?.cancel();
        continue;
      }
      if (!res.ok) {
        await res.body?.cancel();
        throw new TransportError(`HTTP ${res.status} from ${url}`, res.status);
      }

      const outcome = await read(res);
      if (outcome.ok) {
        return outcome.value;
      }
      lastError = outcome.error;
      delayMs = outcome.retryAfterMs;
      this.logger.warn(outcome.error.message);
    }

    const attempts = this.maxRetries + 1;
    throw new TransportError(
      `Request failed after ${attempts} attempt(s): ${url}`,
      lastError instanceof TransportError ? lastError.status : undefined,
      lastError ?? undefined,
    );
  }
}

function retryAfterMs(res: Response): number | null {
  const header = res.headers.get('retry-after');
  if (header === null) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  what: string,
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new TransportError(
      `Unexpected ${what} response shape: ${result.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  return result.data;
}
