/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createRegistryRoutes } from "./registry.js";
export { createCellarRoutes } from "./cellars.js";
export { createAccountRoutes } from "./accounts.js";
