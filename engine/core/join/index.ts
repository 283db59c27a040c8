export * from './JoinEngine.js';
