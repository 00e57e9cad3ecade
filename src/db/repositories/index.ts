// Re-export all repositories
export * from './base.js';
export * from './users.js';
export * from './clients.js';
export * from './locations.js';
export * from './assignments.js';
export * from './reports.js';
export * from './photos.js';
