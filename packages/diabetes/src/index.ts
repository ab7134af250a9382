/**
 * @glucolog/diabetes
 *
 * Event model, analytics, and storage for type 1 diabetes logging
 *
 * @example
 * ```typescript
 * import {
 *   createFoodEvent,
 *   assembleChart,
 *   createInMemoryEventStore,
 *   systemClock,
 * } from "@glucolog/diabetes";
 * ```
 */

// Errors - Result type and error catalogue
export * from "./errors.js";

// Values - Validated value objects
export * from "./values/index.js";

// Models - Type definitions
export * from "./models/index.js";

// Events - Factories, snapshots, clock
export * from "./events/index.js";

// Analysis - Pure computations
export * from "./analysis/index.js";

// Queries - Exposed operations and collaborator ports
export * from "./queries/index.js";

// Storage - DynamoDB and in-process event stores
export * from "./storage/index.js";

// Config - Environment configuration
export * from "./config.js";
