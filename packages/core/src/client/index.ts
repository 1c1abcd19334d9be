/**
 * Client module for clickup-cli
 */

export {
  ApiClient,
  createApiClient,
  withBaseUrl,
  withFetch,
  withTimeout,
  withUserAgent,
  type ApiClientConfig,
  type ApiClientOption,
  type DecodeOptions,
  type FetchLike,
  type HttpMethod,
  type RequestDescriptor,
  type RequestOptions,
} from './api-client.js';
export { ClickUpClient, createClickUpClient, type ClickUpClientConfig } from './clickup-client.js';
export {
  ApiError,
  DecodeError,
  OperationError,
  SourceReadError,
  TransportError,
  ValidationError,
  findApiError,
  findError,
  isApiError,
  isTransportError,
} from './errors.js';
export { MESSAGE_EXTRACTORS, classifyResponse, resolveErrorMessage, statusText, type MessageExtractor } from './error-message.js';
export { createBoundary, encodeMultipart, type ByteSource, type MultipartBody, type MultipartUpload, type SourceFailure } from './multipart.js';
