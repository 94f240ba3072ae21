/**
 * Title Set
 * Honorifics, ranks and suffixes that are never part of a person's name.
 * Loaded once from the title list resource and shared read-only.
 */

import fs from 'fs';
import { config } from '../config';
import { ResourceLoadError } from '../errors/DomainError';
import logger from '../utils/logger';

let defaultTitleSet: ReadonlySet<string> | null = null;

/**
 * Parse title list text. Lines starting with '#' are comments; every other
 * whitespace-separated token is a title.
 */
export function parseTitleList(content: string): ReadonlySet<string> {
  const titles = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) {
      continue;
    }
    for (const token of trimmed.split(/\s+/)) {
      titles.add(token);
    }
  }

  return titles;
}

/**
 * Read a title list from disk
 */
export function loadTitleSet(filePath: string): ReadonlySet<string> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw ResourceLoadError.unreadable(
      'title list',
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const titles = parseTitleList(content);
  logger.debug('Loaded title list', { path: filePath, titles: titles.size });
  return titles;
}

/**
 * Process-wide title set, read from the configured path on first use.
 */
export function getTitleSet(): ReadonlySet<string> {
  if (!defaultTitleSet) {
    defaultTitleSet = loadTitleSet(config.titlesPath);
  }
  return defaultTitleSet;
}
