export { assembleDocument } from './document-assembler.js';
export type { AssembleDocumentInput } from './document-assembler.js';
