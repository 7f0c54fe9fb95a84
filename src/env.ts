import fs from 'fs/promises';
import path from 'path';

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const body = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;
    const idx = body.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = body.slice(0, idx).trim();
    let value = body.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    values[key] = value;
  }
  return values;
}

/** Copies .env entries into process.env without overriding variables that are already set. */
export async function loadDotEnv(envPath = path.join(process.cwd(), '.env')): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    // No .env file found; skip.
    return;
  }
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
