export * as SF from './sf.js';
