export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as queryRoutes } from './query-routes.js';
export { default as ruleRoutes } from './rule-routes.js';
export { default as subjectRoutes } from './subject-routes.js';
export { default as alertRoutes } from './alert-routes.js';
export { default as statusRoutes } from './status-routes.js';
export { errorHandler } from './error-handler.js';
