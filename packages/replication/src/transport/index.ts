export * from './http.js';
export * from './types.js';
