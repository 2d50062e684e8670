// -----------------------------------------------------------------------------
// Database schema
// -----------------------------------------------------------------------------

export * from './enums.js';
export * from './users.js';
export * from './voices.js';
export * from './projects.js';
export * from './episodes.js';
export * from './cover-styles.js';
export * from './relations.js';
