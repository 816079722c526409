// Zod schemas, inferred types and the export-payload schema registry
export * from './schemas/index.js';

// Pure utils (era dates, yen amounts, constants)
export * from './utils/index.js';
