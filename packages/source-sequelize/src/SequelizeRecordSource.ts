import { Op, Sequelize } from 'sequelize';
import type { Options } from 'sequelize';
import type { ArchiveEntry, RecordIndex, RecordSource, RecordSourceFactory, SourceMetadata } from '@shardkit/core';
import { defineArchiveEntryModel, DEFAULT_TABLE_NAME, ENTRY_ATTRIBUTES } from './models/ArchiveEntryModel.js';
import type { ArchiveEntryModel } from './models/ArchiveEntryModel.js';
import * as ArchiveEntryMapper from './mappers/ArchiveEntryMapper.js';
import { betterSqliteDialect, OPEN_CREATE, OPEN_READWRITE } from './sqlite/BetterSqliteDatabase.js';

export interface SequelizeRecordSourceOptions {
  /** Default: `shardkit_archive_entries`. */
  readonly tableName?: string;
  /** Rows fetched per query while iterating. Default: `1000`. */
  readonly pageSize?: number;
}

/**
 * Record source over one Sequelize connection.
 *
 * Iteration walks the table by ascending `id` with keyset pagination and never
 * loads payloads; `resolve()` loads one payload by primary key.
 */
export class SequelizeRecordSource implements RecordSource {
  private readonly Entry: ArchiveEntryModel;
  private readonly pageSize: number;
  private iterated = false;
  private closed = false;

  constructor(
    private readonly sequelize: Sequelize,
    options?: SequelizeRecordSourceOptions,
  ) {
    this.Entry = defineArchiveEntryModel(sequelize, options?.tableName);
    this.pageSize = options?.pageSize ?? 1000;
    if (!Number.isSafeInteger(this.pageSize) || this.pageSize < 1) {
      throw new Error(`Page size must be a positive integer, got ${String(this.pageSize)}`);
    }
  }

  async *iterate(): AsyncIterable<ArchiveEntry> {
    this.assertOpen();
    if (this.iterated) {
      throw new Error('SequelizeRecordSource: entries have already been iterated. Open a new source.');
    }
    this.iterated = true;

    let lastIndex = -1;
    for (;;) {
      const rows = await this.Entry.findAll({
        attributes: [...ENTRY_ATTRIBUTES],
        where: { id: { [Op.gt]: lastIndex } },
        order: [['id', 'ASC']],
        limit: this.pageSize,
      });

      for (const row of rows) {
        const entry = ArchiveEntryMapper.toDomain(row.get({ plain: true }));
        lastIndex = entry.index;
        yield entry;
      }

      if (rows.length < this.pageSize) return;
    }
  }

  async resolve(index: RecordIndex): Promise<Uint8Array> {
    this.assertOpen();
    const row = await this.Entry.findByPk(index, { attributes: ['payload'] });
    if (!row) {
      throw new Error(`Record ${String(index)} not found`);
    }
    return ArchiveEntryMapper.toPayload(row.get('payload'));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.sequelize.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('SequelizeRecordSource: source is closed');
  }
}

/** How the factory obtains connections. */
export interface SequelizeConnector {
  /** New connection for one record source handle. */
  readonly connect: () => Sequelize;
  /** Connection used by `initialize()`. Default: `connect`. */
  readonly connectForWrite?: () => Sequelize;
  /** Shown in diagnostics. */
  readonly location?: string;
}

/**
 * Opens a new Sequelize connection for every record source handle.
 *
 * @example
 * ```typescript
 * const factory = SequelizeRecordSourceFactory.forSqliteFile('./wiki.sqlite');
 * const engine = new ShardEngine({ source: factory, sink, filter });
 * ```
 */
export class SequelizeRecordSourceFactory implements RecordSourceFactory {
  constructor(
    private readonly connector: SequelizeConnector,
    private readonly options?: SequelizeRecordSourceOptions,
  ) {}

  /** Factory over a SQLite archive file. `open()` fails if the file does not exist. */
  static forSqliteFile(filePath: string, options?: SequelizeRecordSourceOptions): SequelizeRecordSourceFactory {
    const sqliteOptions = (mode: number): Options => ({
      dialect: 'sqlite',
      storage: filePath,
      logging: false,
      dialectModule: betterSqliteDialect,
      dialectOptions: { mode },
    });

    return new SequelizeRecordSourceFactory(
      {
        connect: () => new Sequelize(sqliteOptions(OPEN_READWRITE)),
        connectForWrite: () => new Sequelize(sqliteOptions(OPEN_READWRITE | OPEN_CREATE)),
        location: filePath,
      },
      options,
    );
  }

  async open(): Promise<RecordSource> {
    const sequelize = this.connector.connect();
    try {
      await sequelize.authenticate();
    } catch (error) {
      await sequelize.close();
      throw error;
    }
    return new SequelizeRecordSource(sequelize, this.options);
  }

  /** Create the archive table if it does not exist. */
  async initialize(): Promise<void> {
    const connect = this.connector.connectForWrite ?? this.connector.connect;
    const sequelize = connect();
    try {
      await defineArchiveEntryModel(sequelize, this.options?.tableName ?? DEFAULT_TABLE_NAME).sync();
    } finally {
      await sequelize.close();
    }
  }

  describe(): SourceMetadata {
    return { name: 'sequelize', location: this.connector.location };
  }
}
