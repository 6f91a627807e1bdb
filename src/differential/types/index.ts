// Core classification types
export * from './HTTPMessage.js';
export * from './ServerProfile.js';
export * from './Discrepancy.js';
export * from './Configuration.js';
