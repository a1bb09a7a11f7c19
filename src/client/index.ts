/**
 * Client handle and factories
 */

export type { S3TransferClientDeps } from './client.js';
export { S3TransferClient } from './client.js';
export type { ClientOptions, ConnectOptions } from './factory.js';
export { connect, createClient, createClientFromEnv } from './factory.js';
export type { QueryParams, S3Request } from './request.js';
export { RequestExecutor, buildRequestUrl, toStorageError } from './request.js';
