export {
  durationSchema,
  headerMapSchema,
  retryOptionsSchema,
} from './options.js';
