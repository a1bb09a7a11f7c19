/**
 * Error system for the S3 client
 * @module s3-resumable-client/errors
 */

export { S3Error, type S3ErrorParams } from './error.js';

export {
  ConfigError,
  ValidationError,
  SigningError,
  NetworkError,
  StorageError,
  TransferError,
  ResumeDataInvalidError,
  LocalIoError,
} from './categories.js';

export {
  mapHttpStatusToError,
  isRetryableError,
  isS3Error,
  wrapError,
  wrapLocalIoError,
} from './mapping.js';
