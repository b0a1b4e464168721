export { createApp } from './server.js';
