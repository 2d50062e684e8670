import { relations } from "drizzle-orm";
import { users, apiKeys } from './users';
import { voices } from './voices';
import { projects, projectCharacters, projectTemplates } from './projects';
import { episodes } from './episodes';

// -----------------------------------------------------------------------------
// Relations (for type safety with Drizzle ORM queries)
// -----------------------------------------------------------------------------

export const usersRelations = relations(users, ({ many }) => ({
  voices: many(voices),
  projects: many(projects),
  apiKeys: many(apiKeys),
  templates: many(projectTemplates),
}));

export const apiKeysRelations = relations(apiKeys, ({ one }) => ({
  user: one(users, {
    fields: [apiKeys.userId],
    references: [users.id],
  }),
}));

export const voicesRelations = relations(voices, ({ one, many }) => ({
  user: one(users, {
    fields: [voices.userId],
    references: [users.id],
  }),
  characters: many(projectCharacters),
}));

export const projectsRelations = relations(projects, ({ one, many }) => ({
  user: one(users, {
    fields: [projects.userId],
    references: [users.id],
  }),
  characters: many(projectCharacters),
  episodes: many(episodes),
}));

export const projectCharactersRelations = relations(projectCharacters, ({ one }) => ({
  project: one(projects, {
    fields: [projectCharacters.projectId],
    references: [projects.id],
  }),
  voice: one(voices, {
    fields: [projectCharacters.voiceId],
    references: [voices.id],
  }),
}));

export const episodesRelations = relations(episodes, ({ one }) => ({
  project: one(projects, {
    fields: [episodes.projectId],
    references: [projects.id],
  }),
}));

export const projectTemplatesRelations = relations(projectTemplates, ({ one }) => ({
  user: one(users, {
    fields: [projectTemplates.userId],
    references: [users.id],
  }),
}));
