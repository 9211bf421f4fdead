import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export const DEFAULT_TABLE_NAME = 'shardkit_archive_entries';

/** Archive table: `id` is the record index, `payload` the raw document bytes. */
export type ArchiveEntryModel = ModelStatic<Model>;

/** Attributes read while scanning; the payload is only loaded by `resolve()`. */
export const ENTRY_ATTRIBUTES = ['id', 'title', 'namespace', 'isRedirect', 'isDeleted'] as const;

export function defineArchiveEntryModel(sequelize: Sequelize, tableName = DEFAULT_TABLE_NAME): ArchiveEntryModel {
  return sequelize.define(
    'ShardkitArchiveEntry',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: false,
      },
      title: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      namespace: {
        type: DataTypes.STRING(8),
        allowNull: false,
      },
      isRedirect: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      isDeleted: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      payload: {
        type: DataTypes.BLOB,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
