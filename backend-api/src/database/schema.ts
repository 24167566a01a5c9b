import { bigint, boolean, index, jsonb, pgTable, text, uniqueIndex } from 'drizzle-orm/pg-core';

import type { BusinessConfigData } from '@aircargo/shared';

// Идентификаторы - 64-битные snowflake (bigint), время - Unix-time в миллисекундах.

export const dictTypes = pgTable(
  'dict_types',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    name: text('name').notNull(),
    type: text('type').notNull(),
    status: boolean('status').notNull().default(true),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (t) => ({
    typeIdx: uniqueIndex('dict_types_type_uq').on(t.type),
    statusIdx: index('dict_types_status_idx').on(t.status),
  }),
);

// Одна строка на значение; все строки группы разделяют group_id, тип, label и status.
export const dictOptions = pgTable(
  'dict_options',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    groupId: bigint('group_id', { mode: 'bigint' }).notNull(),
    dictTypeId: bigint('dict_type_id', { mode: 'bigint' })
      .notNull()
      .references(() => dictTypes.id, { onDelete: 'cascade' }),
    label: text('label').notNull(),
    value: text('value').notNull(),
    status: boolean('status').notNull().default(true),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (t) => ({
    typeLabelValueIdx: uniqueIndex('dict_options_type_label_value_uq').on(t.dictTypeId, t.label, t.value),
    groupIdx: index('dict_options_group_idx').on(t.groupId),
    typeLabelIdx: index('dict_options_type_label_idx').on(t.dictTypeId, t.label),
  }),
);

// Одна запись на пользователя (sub из JWT); config_data хранится как есть.
export const businessConfigs = pgTable(
  'business_configs',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    userId: text('user_id').notNull(),
    configData: jsonb('config_data').$type<BusinessConfigData>().notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (t) => ({
    userIdx: uniqueIndex('business_configs_user_uq').on(t.userId),
  }),
);
