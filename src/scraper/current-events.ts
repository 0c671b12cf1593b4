/**
 * Current Events Scraper
 *
 * Fetches the daily current-events portal page and turns its top-level
 * bullet list into ordered events. Only first-level list items count:
 * nested bullets are part of their parent's text.
 */
import * as cheerio from 'cheerio';
import { ScrapeError, toErrorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { BriefDate } from './brief-date.js';

const log = createLogger('scraper');

export interface ScrapedEvent {
  title: string;
  text: string;
}

export interface ScrapeOptions {
  baseUrl: string;
  userAgent: string;
  /** Request timeout in milliseconds */
  timeout: number;
  fetch?: typeof fetch;
}

const CONTENT_SELECTOR = 'div.current-events-content.description';

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function buildPortalUrl(baseUrl: string, date: BriefDate): string {
  return `${baseUrl.replace(/\/+$/, '')}/${date.portal}`;
}

/**
 * Parse the portal HTML into events keyed by title.
 * A repeated title replaces the earlier text and keeps the earlier position.
 */
export function parseCurrentEvents(html: string): ScrapedEvent[] {
  const $ = cheerio.load(html);
  const content = $(CONTENT_SELECTOR).first();
  if (content.length === 0) {
    return [];
  }

  const events = new Map<string, string>();

  content.children('ul').each((_, ul) => {
    $(ul)
      .children('li')
      .each((_, li) => {
        const item = $(li);
        const text = normalizeText(item.text());
        const anchor = item.find('a').first();
        const title = anchor.length > 0 ? normalizeText(anchor.text()) : text;
        if (!title) {
          return;
        }
        events.set(title, text);
      });
  });

  return Array.from(events, ([title, text]) => ({ title, text }));
}

/**
 * Fetch and parse the portal page for a date
 */
export async function scrapeCurrentEvents(date: BriefDate, options: ScrapeOptions): Promise<ScrapedEvent[]> {
  const url = buildPortalUrl(options.baseUrl, date);
  const fetchImpl = options.fetch ?? fetch;
  log.info(`Processing URL: ${url}`);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html',
      },
      signal: AbortSignal.timeout(options.timeout),
    });
  } catch (err) {
    throw new ScrapeError(`Error fetching ${url}: ${toErrorMessage(err)}`, url);
  }

  if (!response.ok) {
    throw new ScrapeError(`Error fetching ${url}: HTTP ${response.status} ${response.statusText}`, url, response.status);
  }

  let html: string;
  try {
    html = await response.text();
  } catch (err) {
    throw new ScrapeError(`Error reading ${url}: ${toErrorMessage(err)}`, url, response.status);
  }

  const events = parseCurrentEvents(html);

  if (events.length === 0) {
    log.warn(`No events found for ${date.display}`, { url });
  } else {
    log.info(`Total events found: ${events.length}`, { date: date.iso });
  }

  return events;
}
