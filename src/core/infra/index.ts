/**
 * File: src/core/infra/index.ts
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './console/nodeConsoleSink';
export * from './console/pinoConsoleSink';
