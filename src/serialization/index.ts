export type { FileFormat } from './format.js';
export { inferFormat, parseDocument, stringifyDocument } from './format.js';
export type { LoadOptions } from './loader.js';
export {
  loadTestSetFromFile,
  loadTestSetFromObject,
  loadTestSetFromText,
  saveTestSetToFile,
  serializeTestSet,
} from './loader.js';
export type { TestCaseFile, TestSetFile } from './schema.js';
export {
  conversationTurnSchema,
  expectationsSchema,
  testCaseFileSchema,
  testSetFileSchema,
  toolCallSchema,
} from './schema.js';
