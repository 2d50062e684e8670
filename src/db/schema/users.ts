import { pgTable, uuid, varchar, timestamp, text, boolean, uniqueIndex } from "drizzle-orm/pg-core";
import { languageEnum, llmProviderEnum, storageTypeEnum } from './enums';

// -----------------------------------------------------------------------------
// Users domain
// -----------------------------------------------------------------------------

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  email: varchar("email", { length: 255 }).notNull(),
  username: varchar("username", { length: 50 }).notNull(),
  passwordHash: varchar("password_hash", { length: 255 }).notNull(),

  // Vendor credentials are stored encrypted
  llmProvider: llmProviderEnum("llm_provider").default('openrouter').notNull(),
  llmApiKey: text("llm_api_key"),
  llmModel: varchar("llm_model", { length: 100 }),
  elevenlabsApiKey: text("elevenlabs_api_key"),
  kieaiApiKey: text("kieai_api_key"),

  storageType: storageTypeEnum("storage_type").default('local').notNull(),
  googleDriveCredentials: text("google_drive_credentials"),

  telegramChatId: varchar("telegram_chat_id", { length: 50 }),

  // Null means "use the built-in default"
  aiWriterPrompt: text("ai_writer_prompt"),
  coverPromptTemplate: text("cover_prompt_template"),

  language: languageEnum("language").default('en').notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  emailIdx: uniqueIndex("users_email_idx").on(table.email),
  usernameIdx: uniqueIndex("users_username_idx").on(table.username),
}));

export const apiKeys = pgTable("api_keys", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  keyHash: varchar("key_hash", { length: 64 }).notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }),
  lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  keyHashIdx: uniqueIndex("api_keys_key_hash_idx").on(table.keyHash),
}));

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export type ApiKey = typeof apiKeys.$inferSelect;
export type NewApiKey = typeof apiKeys.$inferInsert;
