/**
 * API Routes
 */

export { testRoutes } from './test.js';
export type { TestRoutesOptions } from './test.js';
