export { findSourceDocuments } from './walk.js';
export { markAsProcessed, mirrorPath, writeOutput } from './marker.js';
