export * from './hostname-extractor.js';
export * from './adapter-sections.js';
export * from './sea-section-parser.js';
export * from './config-assembler.js';
export * from './batch-extractor.js';
export * from './text-diagram.js';
