import fs from 'fs/promises';
import path from 'path';
import { formatDateKey } from '../../dates.js';
import { silentLogger, type Logger } from '../../logger.js';
import type { CatalogueEntry } from '../../types.js';
import type { WildberriesClient } from './client.js';
import { CATALOGUE_CACHE_FILE, SITE_ORIGIN } from './constants.js';
import { isRecord } from './mapper.js';

/**
 * Walks the nested menu and keeps every node that can be queried. The menu
 * is inconsistent about keys, so nodes missing any of them are skipped
 * while their children are still visited.
 */
export function flattenCatalogue(nodes: unknown, into: CatalogueEntry[] = []): CatalogueEntry[] {
  if (!Array.isArray(nodes)) {
    return into;
  }
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const { name, url, shard, query } = node;
    if (typeof name === 'string' && typeof url === 'string' && typeof shard === 'string' && typeof query === 'string'
      && shard && query) {
      into.push({ name, url, shard, query });
    }
    if (node.childs) {
      flattenCatalogue(node.childs, into);
    }
  }
  return into;
}

function normalizeCategoryInput(input: string): string {
  const trimmed = input.trim();
  const withoutOrigin = trimmed.startsWith(SITE_ORIGIN) ? trimmed.slice(SITE_ORIGIN.length) : trimmed;
  return withoutOrigin.split(/[?#]/)[0];
}

/** Matches by exact link path or by case-insensitive name. */
export function findCategory(entries: CatalogueEntry[], input: string): CatalogueEntry | null {
  const byUrl = normalizeCategoryInput(input);
  const byName = input.trim().toLowerCase();
  return entries.find(entry => entry.url === byUrl || entry.name.trim().toLowerCase() === byName) ?? null;
}

async function isFreshToday(filePath: string, today: Date): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() && formatDateKey(stat.mtime) === formatDateKey(today);
  } catch {
    return false;
  }
}

/**
 * Returns the flattened category list, downloading the menu at most once
 * per day and keeping a copy in `cacheDir`.
 */
export async function loadCatalogue(
  client: WildberriesClient,
  cacheDir: string,
  today: Date = new Date(),
  logger: Logger = silentLogger
): Promise<CatalogueEntry[]> {
  const cachePath = path.join(cacheDir, CATALOGUE_CACHE_FILE);
  if (await isFreshToday(cachePath, today)) {
    logger.debug(`Using cached catalogue ${cachePath}`);
    const cached: unknown = JSON.parse(await fs.readFile(cachePath, 'utf-8'));
    return flattenCatalogue(cached);
  }

  logger.debug('Downloading current catalogue...');
  const menu = await client.fetchCatalogue();
  await fs.mkdir(cacheDir, { recursive: true });
  await fs.writeFile(cachePath, JSON.stringify(menu, null, 2), 'utf-8');
  logger.debug(`Catalogue saved: ${cachePath}`);
  return flattenCatalogue(menu);
}
