export * from './PresetModel.js';
