export { HelloPlugin, createPlugin } from './hello-plugin.js';
