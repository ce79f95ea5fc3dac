export { HttpClientError, type HttpClientErrorOptions } from './base.js';
export {
  BodyReadError,
  NetworkError,
  NonSuccessStatusError,
  RequestBuildError,
  UnexpectedStatusError,
} from './http.js';
export {
  DecodeError,
  SerializationError,
  ValidationError,
} from './validation.js';
