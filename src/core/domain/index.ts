/**
 * Filename: src/core/domain/index.ts
 * Summary: Barrel exports for domain model types used by the application layer.
 */

export * from './log';
export * from './logLevel';
