/** Identifier assigned to an entry by its record source. Stable for the duration of one run only. */
export type RecordIndex = number;

/** Metadata of one archive entry, as yielded by a sequential scan. Payloads are resolved separately. */
export interface ArchiveEntry {
  readonly index: RecordIndex;
  readonly title: string;
  /** Namespace tag of the entry (e.g. `'A'` for articles). */
  readonly namespace: string;
  readonly isRedirect: boolean;
  readonly isDeleted: boolean;
}

/** Check whether a value is usable as a record index (a non-negative safe integer). */
export function isRecordIndex(value: unknown): value is RecordIndex {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}
