export { DocumentWriter } from './writer.js';
export { IndexGenerator, INDEX_FILENAME } from './index-generator.js';
export type { IndexEntry } from './index-generator.js';
export {
  slugify,
  documentFilename,
  FilenameAllocator,
  addProvenanceHeader,
} from './utils.js';
