/**
 * User Service
 * Accounts, credentials, per-user vendor settings and personal API keys
 */

import { and, desc, eq, or } from 'drizzle-orm';
import { logger } from '@/config/logger.js';
import { getProviderModels, type LLMProviderId } from '@/config/providers.js';
import type { SupportedLanguage } from '@/config/locales.js';
import { getDatabase } from '@/db/connection.js';
import { apiKeys, users, type ApiKey, type User } from '@/db/schema/users.js';
import {
  AlreadyExistsError,
  AuthenticationError,
  InvalidCredentialsError,
  NotFoundError,
} from '@/shared/errors.js';
import {
  encryptSecret,
  generateApiKey,
  hashApiKey,
  hashPassword,
  verifyPassword,
} from '@/shared/security.js';

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
  language: SupportedLanguage;
}

export interface ProfileUpdate {
  email?: string | undefined;
  username?: string | undefined;
  language?: SupportedLanguage | undefined;
  telegramChatId?: string | null | undefined;
}

export interface LLMSettingsUpdate {
  provider: LLMProviderId;
  apiKey?: string | null | undefined;
  model?: string | null | undefined;
}

export interface PromptsUpdate {
  aiWriterPrompt?: string | null | undefined;
  coverPromptTemplate?: string | null | undefined;
}

export class UserService {
  private db = getDatabase();

  async getById(userId: string): Promise<User | null> {
    const [user] = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);
    return user ?? null;
  }

  async register(input: RegisterInput): Promise<User> {
    await this.assertUnique('email', input.email);
    await this.assertUnique('username', input.username);

    const [user] = await this.db
      .insert(users)
      .values({
        email: input.email,
        username: input.username,
        passwordHash: await hashPassword(input.password),
        language: input.language,
      })
      .returning();

    if (!user) {
      throw new Error('User insert returned no row');
    }

    logger.info('User registered', { userId: user.id, username: user.username });
    return user;
  }

  /**
   * Resolve a login (email or username) and password to an active user
   */
  async authenticate(login: string, password: string): Promise<User> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(or(eq(users.username, login), eq(users.email, login)))
      .limit(1);

    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }
    if (!user.isActive) {
      throw new AuthenticationError('Account is deactivated');
    }
    return user;
  }

  async changePassword(user: User, currentPassword: string, newPassword: string): Promise<void> {
    if (!(await verifyPassword(currentPassword, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }
    await this.update(user.id, { passwordHash: await hashPassword(newPassword) });
    logger.info('Password changed', { userId: user.id });
  }

  async updateProfile(user: User, changes: ProfileUpdate): Promise<User> {
    const values: Partial<typeof users.$inferInsert> = {};

    if (changes.email && changes.email !== user.email) {
      await this.assertUnique('email', changes.email);
      values.email = changes.email;
    }
    if (changes.username && changes.username !== user.username) {
      await this.assertUnique('username', changes.username);
      values.username = changes.username;
    }
    if (changes.language) {
      values.language = changes.language;
    }
    if (changes.telegramChatId !== undefined) {
      values.telegramChatId = changes.telegramChatId;
    }

    return this.update(user.id, values);
  }

  /**
   * A model is kept only when the provider lists it (or lists nothing)
   */
  async updateLLMSettings(user: User, settings: LLMSettingsUpdate): Promise<User> {
    const values: Partial<typeof users.$inferInsert> = { llmProvider: settings.provider };

    if (settings.apiKey) {
      values.llmApiKey = encryptSecret(settings.apiKey);
    }
    if (settings.model) {
      const available = getProviderModels(settings.provider);
      if (available.length === 0 || available.includes(settings.model)) {
        values.llmModel = settings.model;
      }
    }

    return this.update(user.id, values);
  }

  setElevenLabsKey(user: User, apiKey: string): Promise<User> {
    return this.update(user.id, { elevenlabsApiKey: encryptSecret(apiKey) });
  }

  setKieAIKey(user: User, apiKey: string): Promise<User> {
    return this.update(user.id, { kieaiApiKey: encryptSecret(apiKey) });
  }

  async updateStorage(
    user: User,
    storageType: User['storageType'],
    googleDriveCredentials?: Record<string, unknown> | null,
  ): Promise<User> {
    const values: Partial<typeof users.$inferInsert> = { storageType };
    if (googleDriveCredentials) {
      values.googleDriveCredentials = encryptSecret(JSON.stringify(googleDriveCredentials));
    }
    return this.update(user.id, values);
  }

  async updatePrompts(user: User, prompts: PromptsUpdate): Promise<User> {
    const values: Partial<typeof users.$inferInsert> = {};
    if (prompts.aiWriterPrompt != null) {
      values.aiWriterPrompt = prompts.aiWriterPrompt;
    }
    if (prompts.coverPromptTemplate != null) {
      values.coverPromptTemplate = prompts.coverPromptTemplate;
    }
    return this.update(user.id, values);
  }

  // null falls back to the bundled defaults
  resetPrompts(user: User): Promise<User> {
    return this.update(user.id, { aiWriterPrompt: null, coverPromptTemplate: null });
  }

  // ---------------------------------------------------------------------------
  // API keys
  // ---------------------------------------------------------------------------

  listApiKeys(userId: string): Promise<ApiKey[]> {
    return this.db.select().from(apiKeys).where(eq(apiKeys.userId, userId)).orderBy(desc(apiKeys.createdAt));
  }

  async createApiKey(
    userId: string,
    name: string,
    expiresInDays: number | null,
  ): Promise<{ apiKey: ApiKey; plainKey: string }> {
    const { plainKey, keyHash } = generateApiKey();
    const expiresAt = expiresInDays ? new Date(Date.now() + expiresInDays * 86400 * 1000) : null;

    const [apiKey] = await this.db.insert(apiKeys).values({ userId, keyHash, name, expiresAt }).returning();
    if (!apiKey) {
      throw new Error('API key insert returned no row');
    }

    logger.info('API key created', { userId, apiKeyId: apiKey.id });
    return { apiKey, plainKey };
  }

  async revokeApiKey(userId: string, keyId: string): Promise<void> {
    const revoked = await this.db
      .update(apiKeys)
      .set({ isActive: false })
      .where(and(eq(apiKeys.id, keyId), eq(apiKeys.userId, userId)))
      .returning({ id: apiKeys.id });

    if (revoked.length === 0) {
      throw new NotFoundError('API key', keyId);
    }
  }

  /**
   * Look up an active key by its plaintext value and stamp last_used_at.
   * Returns the owning user id, or null when no active key matches.
   */
  async resolveApiKey(plainKey: string): Promise<string | null> {
    const [apiKey] = await this.db
      .select()
      .from(apiKeys)
      .where(and(eq(apiKeys.keyHash, hashApiKey(plainKey)), eq(apiKeys.isActive, true)))
      .limit(1);

    if (!apiKey) {
      return null;
    }
    if (apiKey.expiresAt && apiKey.expiresAt.getTime() < Date.now()) {
      throw new AuthenticationError('API key has expired');
    }

    await this.db.update(apiKeys).set({ lastUsedAt: new Date() }).where(eq(apiKeys.id, apiKey.id));
    return apiKey.userId;
  }

  private async assertUnique(field: 'email' | 'username', value: string): Promise<void> {
    const column = field === 'email' ? users.email : users.username;
    const [existing] = await this.db.select({ id: users.id }).from(users).where(eq(column, value)).limit(1);
    if (existing) {
      throw new AlreadyExistsError('User', field);
    }
  }

  private async update(userId: string, values: Partial<typeof users.$inferInsert>): Promise<User> {
    const [user] = await this.db
      .update(users)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning();

    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return user;
  }
}
