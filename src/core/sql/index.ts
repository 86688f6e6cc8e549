export * from './reference-extractor.js';
