import { describe, it, expect } from 'vitest';
import { classifyEntry } from '../../../src/domain/services/EntryFilter.js';
import type { EntryFilter } from '../../../src/domain/services/EntryFilter.js';
import type { ArchiveEntry } from '../../../src/domain/model/ArchiveEntry.js';

function entry(overrides?: Partial<ArchiveEntry>): ArchiveEntry {
  return { index: 1, title: 'Budapest', namespace: 'A', isRedirect: false, isDeleted: false, ...overrides };
}

const filter: EntryFilter = { namespace: 'A', excludeTitle: '(disambiguation)' };

describe('classifyEntry', () => {
  it('should keep an article in the configured namespace', () => {
    expect(classifyEntry(entry(), filter)).toBeNull();
  });

  it('should drop entries from other namespaces', () => {
    expect(classifyEntry(entry({ namespace: 'I' }), filter)).toBe('namespace');
  });

  it('should drop deleted entries', () => {
    expect(classifyEntry(entry({ isDeleted: true }), filter)).toBe('deleted');
  });

  it('should drop redirects', () => {
    expect(classifyEntry(entry({ isRedirect: true }), filter)).toBe('redirect');
  });

  it('should drop titles containing the exclusion pattern', () => {
    expect(classifyEntry(entry({ title: 'Mercury (disambiguation)' }), filter)).toBe('excluded-title');
  });

  it('should match string patterns literally, not as regular expressions', () => {
    expect(classifyEntry(entry({ title: 'Mercury disambiguation' }), filter)).toBeNull();
  });

  it('should test RegExp patterns against the title', () => {
    const regexFilter: EntryFilter = { namespace: 'A', excludeTitle: /^List of /g };

    expect(classifyEntry(entry({ title: 'List of rivers' }), regexFilter)).toBe('excluded-title');
    expect(classifyEntry(entry({ title: 'List of lakes' }), regexFilter)).toBe('excluded-title');
    expect(classifyEntry(entry({ title: 'A list of rivers' }), regexFilter)).toBeNull();
  });

  it('should keep every title when no exclusion pattern is configured', () => {
    expect(classifyEntry(entry({ title: 'Mercury (disambiguation)' }), { namespace: 'A' })).toBeNull();
  });

  it('should never exclude on an empty string pattern', () => {
    expect(classifyEntry(entry(), { namespace: 'A', excludeTitle: '' })).toBeNull();
  });

  describe('predicate priority', () => {
    it('should report namespace before any other reason', () => {
      const all = entry({ namespace: 'M', isDeleted: true, isRedirect: true, title: 'X (disambiguation)' });
      expect(classifyEntry(all, filter)).toBe('namespace');
    });

    it('should report deleted before redirect and title', () => {
      const deleted = entry({ isDeleted: true, isRedirect: true, title: 'X (disambiguation)' });
      expect(classifyEntry(deleted, filter)).toBe('deleted');
    });

    it('should report redirect before the title pattern', () => {
      const redirect = entry({ isRedirect: true, title: 'X (disambiguation)' });
      expect(classifyEntry(redirect, filter)).toBe('redirect');
    });
  });
});
