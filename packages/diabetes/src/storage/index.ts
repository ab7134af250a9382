/**
 * @glucolog/diabetes - Storage
 *
 * DynamoDB and in-process event stores
 */

// Client
export { createDocClient, type DocClient } from "./client.js";

// Key generation
export {
  padTimestamp,
  eventPrimaryKey,
  userEventsPartition,
  userTypePartition,
  timeRangeBounds,
  generateEventKeys,
  type EventKeys,
} from "./keys.js";

// Event operations
export {
  putEvent,
  getEventById,
  queryEventsByUser,
  countEventsByUser,
  queryEventsPage,
  createDynamoEventStore,
  type EventItem,
} from "./events.js";

export { createInMemoryEventStore } from "./memory.js";
