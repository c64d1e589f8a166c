import { pgTable, text, timestamp, integer, jsonb, primaryKey, uniqueIndex } from 'drizzle-orm/pg-core';

export const users = pgTable('users', {
  userId: text('user_id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const cards = pgTable('cards', {
  cardId: text('card_id').primaryKey(),
  userId: text('user_id').references(() => users.userId, {
    onDelete: 'cascade',
  }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Keyed by plain user id text: virtual identities get identifiers too and have no users row.
export const profileIdentifiers = pgTable('profile_identifiers', {
  game: text('game').notNull(),
  version: integer('version').notNull(),
  userId: text('user_id').notNull(),
  refId: text('ref_id').notNull(),
  extId: integer('ext_id').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.game, table.version, table.userId] }),
  refIdx: uniqueIndex('profile_identifiers_ref_idx').on(table.game, table.version, table.refId),
  extIdx: uniqueIndex('profile_identifiers_ext_idx').on(table.game, table.version, table.extId),
}));

export const profiles = pgTable('profiles', {
  userId: text('user_id').references(() => users.userId, {
    onDelete: 'cascade',
  }).notNull(),
  game: text('game').notNull(),
  version: integer('version').notNull(),
  data: jsonb('data').$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.userId, table.game, table.version] }),
}));
