export * from './types.js';
export * from './codec.js';
export * from './prng.js';
export * from './diagnostics.js';
export * from './execution-collector.js';
export * from './adventure-runtime.js';
export * from './vocabulary.js';
export * from './state.js';
export * from './eval-condition.js';
export * from './parameter-channel.js';
export * from './command-context.js';
export * from './command-dispatch.js';
export * from './views.js';
export * from './light.js';
export * from './builtins.js';
export * from './action-dispatch.js';
export * from './turn.js';
export * from './save-error.js';
export * from './save-codec.js';
export * from './determinism.js';
