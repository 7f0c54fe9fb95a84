import path from 'path';
import type { ScraperConfig } from './types.js';

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseArgs(args: string[]): Partial<ScraperConfig> {
  const config: Partial<ScraperConfig> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next: string | undefined = args[i + 1];
    if (arg === '--category' || arg === '-c' || arg === '--search' || arg === '-s') {
      // An empty or missing value is kept so the run fails validation instead of prompting.
      config.mode = arg === '--category' || arg === '-c' ? 'category' : 'keyword';
      config.value = next ?? '';
      if (next !== undefined) {
        i += 1;
      }
    } else if (arg === '--pages' && next) {
      config.maxPages = parseInteger(next, 100);
      i += 1;
    } else if (arg === '--retries' && next) {
      config.maxAttempts = parseInteger(next, 3);
      i += 1;
    } else if (arg === '--delay' && next) {
      config.requestDelayMs = parseInteger(next, 0);
      i += 1;
    } else if (arg === '--timeout' && next) {
      config.requestTimeoutMs = parseInteger(next, 30000);
      i += 1;
    } else if (arg === '--sort' && next) {
      config.sort = next;
      i += 1;
    } else if (arg === '--out' && next) {
      config.outputDir = path.resolve(next);
      i += 1;
    } else if (arg === '--no-sales') {
      config.fetchSales = false;
    } else if (arg === '--verbose') {
      config.verbose = true;
    }
  }
  return config;
}

export function buildConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ScraperConfig {
  const dataDir = path.join(process.cwd(), 'data');
  const defaults: ScraperConfig = {
    maxPages: parseInteger(env.WB_MAX_PAGES, 100),
    maxAttempts: parseInteger(env.WB_MAX_ATTEMPTS, 3),
    retryDelayMs: parseInteger(env.WB_RETRY_DELAY_MS, 1000),
    requestDelayMs: parseInteger(env.WB_DELAY_MS, 250),
    requestTimeoutMs: parseInteger(env.WB_TIMEOUT_MS, 30000),
    userAgent: env.WB_USER_AGENT
      || 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
    dest: env.WB_DEST || '-1257786',
    sort: env.WB_SORT || 'popular',
    locale: env.WB_LOCALE || 'ru',
    outputDir: env.WB_OUTPUT_DIR || dataDir,
    cacheDir: env.WB_CACHE_DIR || dataDir,
    fetchSales: env.WB_FETCH_SALES !== 'false',
    salesDelayMs: parseInteger(env.WB_SALES_DELAY_MS, 100),
    verbose: env.WB_VERBOSE === 'true'
  };

  const overrides = parseArgs(args);
  const config = { ...defaults, ...overrides };
  config.maxPages = Math.max(1, config.maxPages);
  config.maxAttempts = Math.max(1, config.maxAttempts);
  return config;
}
