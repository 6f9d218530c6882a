export { createMockLogger, createSilentMockLogger } from './logger/test-utils.js';
export { writeScript, createTempDir } from './plugins/process/test-utils.js';
