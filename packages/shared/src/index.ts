export * from './types/message.js';
export * from './types/exchange.js';
export * from './types/model.js';
export * from './types/config.js';
export * from './schemas/message.schema.js';
export * from './schemas/exchange.schema.js';
export * from './schemas/config.schema.js';
export * from './schemas/task.schema.js';
export * from './constants.js';
export * from './utils/index.js';
