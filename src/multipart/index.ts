export { MultipartService, type CreateMultipartOptions, type UploadPartOptions } from './service.js';
