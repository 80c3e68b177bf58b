/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';

// Health checker factories
export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/index.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ServiceInfoResponse,
} from './core/types.js';
