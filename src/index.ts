/**
 * bo-protocol-generator — per-iteration robot protocols for Bayesian
 * optimization of liquid mixing.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/batch.js';

// Errors
export * from './generation/errors.js';

// Batch normalization
export { normalizeTable, normalizeCsv, batchToRows } from './batch/BatchNormalizer.js';
export { parseCsvTable, splitCsvLine } from './batch/csvTable.js';
export type { CsvTable } from './batch/csvTable.js';

// Template patching
export * from './template/TemplatePatcher.js';
export * from './template/TemplateRegion.js';
export { pyNumber, pyString, serializeBatch, parseDictLiteral } from './template/pythonLiteral.js';
export type { PyScalar } from './template/pythonLiteral.js';

// File generation
export * from './generation/ProtocolGenerator.js';

// Configuration
export * from './config/types.js';
export { loadConfig, resolveConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';

// HTTP API
export type * from './api/types.js';
export { registerRoutes } from './api/routes.js';
export type { RouteOptions } from './api/routes.js';
export { createGenerationHandlers } from './api/handlers/GenerationHandlers.js';
export type { GenerationHandlers } from './api/handlers/GenerationHandlers.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
