import { pgTable, uuid, varchar, timestamp, text, boolean, index } from "drizzle-orm/pg-core";
import { users } from './users';

// User voice library; each entry points at an ElevenLabs voice
export const voices = pgTable("voices", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 100 }).notNull(),
  elevenlabsName: varchar("elevenlabs_name", { length: 100 }).notNull(),
  elevenlabsVoiceId: varchar("elevenlabs_voice_id", { length: 50 }).notNull(),
  description: text("description"),
  isFavorite: boolean("is_favorite").default(false).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  userIdIdx: index("voices_user_id_idx").on(table.userId),
}));

export type Voice = typeof voices.$inferSelect;
export type NewVoice = typeof voices.$inferInsert;
