import { isRecordIndex } from '@shardkit/core';
import type { ArchiveEntry } from '@shardkit/core';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readFlag(row: Record<string, unknown>, column: string): boolean {
  const value = row[column];
  if (typeof value === 'boolean') return value;
  // SQLite stores booleans as 0/1
  if (value === 0 || value === 1) return value === 1;
  throw new Error(`Column '${column}' is not a boolean: ${String(value)}`);
}

function readString(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column '${column}' is not a string: ${String(value)}`);
  }
  return value;
}

/** Map a plain table row to an archive entry. */
export function toDomain(row: unknown): ArchiveEntry {
  if (!isObject(row)) {
    throw new Error('Archive row is not an object');
  }

  const id = row['id'];
  if (!isRecordIndex(id)) {
    throw new Error(`Column 'id' is not a record index: ${String(id)}`);
  }

  return {
    index: id,
    title: readString(row, 'title'),
    namespace: readString(row, 'namespace'),
    isRedirect: readFlag(row, 'isRedirect'),
    isDeleted: readFlag(row, 'isDeleted'),
  };
}

/** Normalize a payload column value to bytes. Text payloads are UTF-8 encoded. */
export function toPayload(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return Buffer.from(value, 'utf-8');
  throw new Error(`Payload column holds ${value === null ? 'null' : typeof value}, expected bytes`);
}
