/**
 * Transport layer exports
 */

export {
  createHttpApp,
  startHttpTransport,
  stopHttpTransport,
  isHttpEnabled,
} from './http.js';
