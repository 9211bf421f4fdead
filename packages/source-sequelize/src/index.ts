export { SequelizeRecordSource, SequelizeRecordSourceFactory } from './SequelizeRecordSource.js';
export type { SequelizeRecordSourceOptions, SequelizeConnector } from './SequelizeRecordSource.js';
export { defineArchiveEntryModel, DEFAULT_TABLE_NAME } from './models/ArchiveEntryModel.js';
export type { ArchiveEntryModel } from './models/ArchiveEntryModel.js';
export { BetterSqliteDatabase, betterSqliteDialect } from './sqlite/BetterSqliteDatabase.js';
