export { default as eventRoutes } from './event-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as corsPlugin } from './cors.js';
export type { CorsOptions } from './cors.js';
export {
  sendError,
  statusForError,
  handleFrameworkError,
  handleNotFound,
} from './error-mapping.js';
export type { ErrorBody } from './error-mapping.js';
