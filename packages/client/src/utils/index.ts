export { readBody, readJSONBody } from './body.js';
export {
  buildRequest,
  createKyInstance,
  isSuccessStatus,
  toNetworkError,
} from './http.js';
export { MAX_TIMER_MS, wait } from './wait.js';
