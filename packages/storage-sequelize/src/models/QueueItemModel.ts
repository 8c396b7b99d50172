import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface QueueItemRow {
  item_id: number;
  name: string;
  data: string | null;
  expire: number | string;
  created: number | string;
}

export type QueueItemModel = ModelStatic<Model>;

export function defineQueueItemModel(sequelize: Sequelize, tableName = 'queue'): QueueItemModel {
  return sequelize.define(
    'SignatureQueueItem',
    {
      item_id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      name: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      data: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      expire: {
        type: DataTypes.BIGINT,
        allowNull: false,
        defaultValue: 0,
      },
      created: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
      indexes: [{ fields: ['name', 'created'] }, { fields: ['expire'] }],
    },
  );
}
