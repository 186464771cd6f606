export * from './types.js';
export * from './schema.js';
export {
  validateMetadata,
  parseMetadataJson,
  formatPath,
  type MetadataDocument,
  type RawMetadata,
  type MetadataResult,
} from './validate.js';
