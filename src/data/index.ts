export * from './load-error.js';
export * from './tokenizer.js';
export * from './token-cursor.js';
export * from './vocabulary-words.js';
export * from './validate-world.js';
export * from './parse-adventure.js';
export * from './load-adventure.js';
