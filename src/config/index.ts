// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Schema, Loader, Environment Accessors
// ═══════════════════════════════════════════════════════════════════════════════

export * from './schema.js';
export * from './loader.js';
