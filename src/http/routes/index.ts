/**
 * HTTP Routes Exports
 */

export { createHealthRouter, type HealthCheckDependencies } from "./health.js";
export { createUserRouter } from "./user.js";
