import { pgTable, uuid, varchar, timestamp, text, boolean, integer, uniqueIndex } from "drizzle-orm/pg-core";

// Editable cover style presets, seeded from src/config/data/cover-styles.json
export const coverStyles = pgTable("cover_styles", {
  id: uuid("id").primaryKey().defaultRandom(),
  key: varchar("key", { length: 50 }).notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  emoji: varchar("emoji", { length: 10 }).default('🎨').notNull(),
  instructions: text("instructions").notNull(),
  mood: varchar("mood", { length: 200 }).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  sortOrder: integer("sort_order").default(0).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  keyIdx: uniqueIndex("cover_styles_key_idx").on(table.key),
}));

export type CoverStyle = typeof coverStyles.$inferSelect;
export type NewCoverStyle = typeof coverStyles.$inferInsert;
