// Re-export all protocol types

export * from './common.js';
export * from './profiles.js';
export * from './estimates.js';
export * from './verification.js';
