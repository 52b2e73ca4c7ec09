/**
 * Main type exports for model-dispatcher
 */

export * from './event.js';
export * from './model.js';
export * from './registry.js';
export * from './context.js';
export * from './telemetry.js';
