/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createIntentRoutes } from "./intents.js";
export { createProofRoutes } from "./proofs.js";
export { createEventRoutes } from "./events.js";
