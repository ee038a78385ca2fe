// Shared types for Parley

export * from './errors.js';
export * from './llm-types.js';
export * from './tool-types.js';
export * from './trace-types.js';
export * from './schemas.js';
export * from './validation.js';
