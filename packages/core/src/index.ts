export * from './errors/index.js';
export * from './logger/index.js';
export * from './config/index.js';
export * from './auth/index.js';
export * from './process/index.js';
export * from './plugins/index.js';
