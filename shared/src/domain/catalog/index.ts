export * from './differencer.js';
export * from './handle.js';
export * from './imageCodec.js';
export * from './money.js';
export * from './productMerger.js';
export * from './projection.js';
export * from './warranty.js';
