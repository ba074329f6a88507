export * from './request.js';
export * from './confidence.js';
export * from './validation.js';
export * from './response.js';
