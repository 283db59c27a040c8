export * from './Automation.js';
