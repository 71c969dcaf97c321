export { cleanCommand, groupByExtension, toJsonReport } from './clean.js';
export { configCommand, getGlobalConcurrency, getGlobalAssumeYes, validateConcurrency } from './config.js';
