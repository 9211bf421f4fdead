import type { ArchiveEntry } from '../model/ArchiveEntry.js';
import { SkipReason } from '../model/SkipReason.js';

/** Which entries the scanner keeps. */
export interface EntryFilter {
  /** Namespace tag to keep; entries in any other namespace are dropped. */
  readonly namespace: string;
  /**
   * Titles to drop (e.g. disambiguation pages). A string matches as a
   * substring of the title; a `RegExp` is tested against it.
   */
  readonly excludeTitle?: string | RegExp;
}

/**
 * Classify an entry against the filter.
 *
 * Predicates are checked in a fixed order and the first match wins:
 * namespace, deleted, redirect, excluded title.
 *
 * @returns The reason the entry is dropped, or `null` when it qualifies.
 */
export function classifyEntry(entry: ArchiveEntry, filter: EntryFilter): SkipReason | null {
  if (entry.namespace !== filter.namespace) return SkipReason.NAMESPACE;
  if (entry.isDeleted) return SkipReason.DELETED;
  if (entry.isRedirect) return SkipReason.REDIRECT;
  if (matchesTitle(entry.title, filter.excludeTitle)) return SkipReason.EXCLUDED_TITLE;
  return null;
}

function matchesTitle(title: string, pattern: string | RegExp | undefined): boolean {
  if (pattern === undefined) return false;
  if (typeof pattern === 'string') return pattern !== '' && title.includes(pattern);
  // Global and sticky expressions keep state in lastIndex between calls
  pattern.lastIndex = 0;
  return pattern.test(title);
}
