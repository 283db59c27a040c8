export * from './Workspace.js';
