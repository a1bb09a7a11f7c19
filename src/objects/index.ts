export {
  ObjectsService,
  formatRange,
  buildObjectHeaders,
  normalizeFolderPath,
  type ObjectHeaderOptions,
  type DeleteFolderOptions,
  type ListObjectsOptions,
  type PutObjectOptions,
  type PutObjectResult,
  type ByteRange,
  type GetObjectOptions,
  type ObjectStream,
  type ObjectLocation,
} from './service.js';
