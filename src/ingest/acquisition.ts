/**
 * Content Acquisition
 *
 * Fetches web pages and stores uploaded bytes under the storage folders:
 *
 * - saveUrlToWeb: one page → `web/external-<hash>.html`
 * - saveBytesToUploads: one upload → `uploads/<hash>-<name>`
 * - scrapeSite: breadth-first same-host crawl → `web/page_<n>.html`
 *
 * federalregister.gov answers automated clients with an access wall that
 * links the official PDF on govinfo.gov; saveUrlToWeb follows that link.
 */

import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'node-html-parser';
import { IngestionError, describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { SourcePolicy } from '../search/types.js';
import type { ScrapeResult } from './types.js';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/122.0 Safari/537.36';

const PAGE_TIMEOUT_MS = 30_000;
const PDF_TIMEOUT_MS = 60_000;
const CRAWL_TIMEOUT_MS = 20_000;

const GOVINFO_PACKAGE_PDF = /https?:\/\/www\.govinfo\.gov\/content\/pkg\/[^"'\s<>]+?\.pdf/i;
const GOVINFO_ANY_PDF = /https?:\/\/www\.govinfo\.gov\/[^"'\s<>]+?\.pdf/i;

export interface AcquisitionOptions {
  policy: SourcePolicy;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Epoch milliseconds (default: Date.now) */
  now?: () => number;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * First 16 hex characters of sha256(name [+ extra]).
 */
export function hashName(name: string, extra?: Uint8Array): string {
  const hash = createHash('sha256').update(name, 'utf-8');
  if (extra && extra.length > 0) {
    hash.update(extra);
  }
  return hash.digest('hex').slice(0, 16);
}

/**
 * Official PDF linked from a federalregister.gov page, if any.
 */
export function findGovinfoPdfUrl(html: string): string | undefined {
  return (GOVINFO_PACKAGE_PDF.exec(html) ?? GOVINFO_ANY_PDF.exec(html))?.[0];
}

/**
 * Absolute http(s) links of a page on the same host, fragments removed.
 */
export function extractLinks(html: string, pageUrl: string, host: string): string[] {
  const links: string[] = [];

  for (const anchor of parse(html).querySelectorAll('a, area')) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href) {
      continue;
    }
    let url: URL;
    try {
      url = new URL(href, pageUrl);
    } catch {
      continue;
    }
    if ((url.protocol === 'http:' || url.protocol === 'https:') && url.host === host) {
      url.hash = '';
      links.push(url.toString());
    }
  }

  return links;
}

const readText = (response: Response): Promise<string> => response.text();

const readBytes = async (response: Response): Promise<Buffer> =>
  Buffer.from(await response.arrayBuffer());

/**
 * GET with the browser user agent and read the body, both within
 * `timeoutMs`.
 *
 * @throws IngestionError on network failure, timeout or non-2xx status
 */
async function fetchBody<T>(
  url: string,
  fetchFn: typeof fetch,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new IngestionError(`GET ${url} returned ${response.status}`);
    }
    return await read(response);
  } catch (error) {
    if (error instanceof IngestionError) {
      throw error;
    }
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : describeError(error);
    throw new IngestionError(`GET ${url} failed: ${reason}`, error instanceof Error ? error : undefined);
  } finally {
    clearTimeout(timeout);
  }
}

// ============================================================================
// ACQUISITION
// ============================================================================

/**
 * Fetch a public URL and save it under the web folder.
 *
 * @returns Path of the saved file
 * @throws IngestionError when the page cannot be fetched
 */
export async function saveUrlToWeb(
  url: string,
  webDir: string,
  options: AcquisitionOptions
): Promise<string> {
  const fetchFn = options.fetch ?? fetch;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;

  await mkdir(webDir, { recursive: true });
  logger.info?.(`Fetching URL: ${url}`);
  const html = await fetchBody(url, fetchFn, PAGE_TIMEOUT_MS, readText);

  if (url.toLowerCase().includes('federalregister.gov') && options.policy.isBlockedPage(html)) {
    logger.info?.('Detected FederalRegister access wall; trying govinfo PDF');
    const stamp = Math.floor(now() / 1000);
    const pdfUrl = findGovinfoPdfUrl(html);

    if (pdfUrl) {
      try {
        const pdf = await fetchBody(pdfUrl, fetchFn, PDF_TIMEOUT_MS, readBytes);
        const out = join(webDir, `federalregister_govinfo_${stamp}.pdf`);
        await writeFile(out, pdf);
        logger.info?.(`Saved govinfo PDF to ${out}`);
        return out;
      } catch (error) {
        logger.warn(`govinfo PDF fetch failed: ${describeError(error)}`);
      }
    }

    const out = join(webDir, `blocked_${stamp}.html`);
    await writeFile(out, html, 'utf-8');
    logger.info?.(`Saved blocked HTML to ${out}`);
    return out;
  }

  const out = join(webDir, `external-${hashName(url)}.html`);
  await writeFile(out, html, 'utf-8');
  logger.info?.(`Saved URL to ${out}`);
  return out;
}

/**
 * Store uploaded bytes under the uploads folder.
 *
 * Only the base name of `filename` is kept.
 *
 * @returns Path of the saved file
 */
export async function saveBytesToUploads(
  filename: string,
  bytes: Uint8Array,
  uploadsDir: string,
  logger: Logger = silentLogger
): Promise<string> {
  const safe = filename.replace(/\\/g, '/').split('/').pop() || 'upload';
  const out = join(uploadsDir, `${hashName(safe, bytes)}-${safe}`);

  await mkdir(uploadsDir, { recursive: true });
  await writeFile(out, bytes);
  logger.info?.(`Saved upload to ${out}`);
  return out;
}

/**
 * Breadth-first crawl of a site, staying on the seed's host.
 *
 * Pages that fail are logged and skipped; they do not count toward
 * `maxPages`.
 */
export async function scrapeSite(
  seedUrl: string,
  maxPages: number,
  targetDir: string,
  options: Omit<AcquisitionOptions, 'policy' | 'now'> = {}
): Promise<ScrapeResult> {
  const fetchFn = options.fetch ?? fetch;
  const logger = options.logger ?? silentLogger;
  const host = new URL(seedUrl).host;

  await mkdir(targetDir, { recursive: true });

  const seen = new Set([seedUrl]);
  const queue = [seedUrl];
  const pages: string[] = [];

  while (queue.length > 0 && pages.length < maxPages) {
    const url = queue.shift();
    if (url === undefined) {
      break;
    }

    try {
      const html = await fetchBody(url, fetchFn, CRAWL_TIMEOUT_MS, readText);
      const out = join(targetDir, `page_${pages.length}.html`);
      await writeFile(out, html, 'utf-8');
      pages.push(out);

      for (const link of extractLinks(html, url, host)) {
        if (!seen.has(link)) {
          seen.add(link);
          queue.push(link);
        }
      }
    } catch (error) {
      logger.warn(`Skip ${url}: ${describeError(error)}`);
    }
  }

  logger.info?.(`Scraped ${pages.length} page(s) from ${seedUrl}`);
  return { dir: targetDir, pages };
}
