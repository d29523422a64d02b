export * from './youtube.js';
export * from './gemini.js';
export * from './report.js';
export * from './mail.js';
export * from './config.js';
