/**
 * Loader for the word lists under data/.
 * Works from src (Jest, ts-node) and from dist.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from './logger';

const wordListSchema = z.object({
  description: z.string().optional(),
  entries: z.array(z.string().min(1)),
});

function candidatePaths(fileName: string): string[] {
  return [
    path.join(__dirname, '..', '..', 'data', fileName),
    path.join(process.cwd(), 'data', fileName),
  ];
}

/**
 * Read a `{ "entries": [...] }` file, trimmed and lowercased.
 * Falls back to `fallback` (and logs) when no readable copy exists.
 */
export function loadWordList(fileName: string, fallback: readonly string[]): string[] {
  for (const dataPath of candidatePaths(fileName)) {
    if (!fs.existsSync(dataPath)) {
      continue;
    }
    try {
      const parsed = wordListSchema.parse(JSON.parse(fs.readFileSync(dataPath, 'utf-8')));
      return parsed.entries.map((entry) => entry.trim().toLowerCase());
    } catch (error) {
      logger.error(`Failed to read ${dataPath}`, error);
    }
  }

  logger.warn(`${fileName} not found, using built-in fallback list`, { entries: fallback.length });
  return [...fallback];
}
