export { default as enginePlugin } from './engine-plugin.js';
export { default as eventRoutes } from './event-routes.js';
export { default as queryRoutes } from './query-routes.js';
export { default as ruleRoutes } from './rule-routes.js';
export { default as deliveryRoutes } from './delivery-routes.js';
