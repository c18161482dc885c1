export * from './kernel/index.js';
export * from './data/index.js';
export * from './config/engine-config.js';
export * from './persistence/save-file.js';
export * from './sim/session.js';
export * from './sim/transcript.js';
