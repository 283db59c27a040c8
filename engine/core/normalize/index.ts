export * from './NumericNormalizer.js';
