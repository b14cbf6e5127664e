export * from './portfolio.js';
export * from './news.js';
export * from './risk.js';
export * from './scan.js';
export * from './events.js';
