export * from './types.js';
export * from './FormatterRegistry.js';
export { imageFormatter } from './imageFormatter.js';
export { ratingFormatter } from './ratingFormatter.js';
export { affixFormatter } from './affixFormatter.js';
export { linkFormatter } from './linkFormatter.js';
