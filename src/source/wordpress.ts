import type { ArticleSource, Timeframe } from './adapter.js';
import { TIMEFRAMES } from './adapter.js';
import { WpPostListSchema } from './article.js';
import { FetchError, InvalidTimeframeError, ResponseParseError } from '../shared/errors.js';
import { errorMessage } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/** WordPress caps `per_page` at 100. */
export const PAGE_SIZE = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

const LOOKBACK_DAYS: Record<Timeframe, number> = {
  day: 1,
  week: 7,
  month: 30,
};

export function computeStartTime(timeframe: string, now: Date = new Date()): Date {
  const known = TIMEFRAMES.find((t) => t === timeframe);
  if (!known) {
    throw new InvalidTimeframeError(timeframe);
  }
  return new Date(now.getTime() - LOOKBACK_DAYS[known] * DAY_MS);
}

export function buildPostsUrl(baseUrl: string, after: Date, perPage = PAGE_SIZE): string {
  const params = new URLSearchParams({
    after: after.toISOString(),
    per_page: String(perPage),
    _embed: '1',
  });
  return `${baseUrl.replace(/\/+$/, '')}/wp-json/wp/v2/posts?${params.toString()}`;
}

export interface WordPressSourceOptions {
  userAgent?: string;
  now?: () => Date;
}

/**
 * Reads posts from the WordPress REST API. Only the first page of each
 * window is returned; older posts beyond {@link PAGE_SIZE} are not paged in.
 */
export class WordPressSource implements ArticleSource {
  private readonly userAgent: string;
  private readonly now: () => Date;

  constructor(
    private readonly baseUrl: string,
    options: WordPressSourceOptions = {},
  ) {
    this.userAgent = options.userAgent ?? 'wpsync/1.0';
    this.now = options.now ?? (() => new Date());
  }

  async fetchByTimeframe(timeframe: string): Promise<unknown[]> {
    const startTime = computeStartTime(timeframe, this.now());
    const url = buildPostsUrl(this.baseUrl, startTime);
    logger.info({ timeframe, url }, 'Fetching articles');

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      });
    } catch (err) {
      throw new FetchError(`Failed to fetch articles: ${errorMessage(err)}`, undefined, undefined, {
        url,
      });
    }

    const body = await response.text();
    logger.debug({ timeframe, status: response.status }, 'WordPress responded');

    if (!response.ok) {
      logger.warn({ timeframe, status: response.status, body: body.slice(0, 500) }, 'Error response');
      throw new FetchError(`Failed to fetch articles: ${response.status}`, response.status, body, {
        url,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new ResponseParseError(`Invalid JSON from WordPress: ${errorMessage(err)}`, {
        url,
        body: body.slice(0, 500),
      });
    }

    const parsed = WpPostListSchema.safeParse(json);
    if (!parsed.success) {
      throw new ResponseParseError('WordPress response is not a list of posts', {
        url,
        body: body.slice(0, 500),
      });
    }

    const articles = parsed.data;
    const total = Number(response.headers.get('x-wp-total'));
    if (Number.isFinite(total) && total > articles.length) {
      logger.warn(
        { timeframe, total, returned: articles.length },
        'More articles in window than one page holds; only the first page is synced',
      );
    }

    logger.info({ timeframe, count: articles.length }, 'Fetched articles');
    return articles;
  }
}
