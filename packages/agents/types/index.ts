export * from './analysis.js';
export * from './agents.js';
export * from './events.js';
