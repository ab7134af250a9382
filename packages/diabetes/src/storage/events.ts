/**
 * DynamoDB storage operations for logged events
 */

import {
  GetCommand,
  PutCommand,
  QueryCommand,
  type NativeAttributeValue,
  type QueryCommandInput,
} from "@aws-sdk/lib-dynamodb";
import type { DiabetesEvent, EventSnapshot } from "../models/index.js";
import { rehydrateEvent, toSnapshot } from "../events/index.js";
import type { EventRangeQuery, EventStore } from "../queries/index.js";
import type { UserId } from "../values/index.js";
import type { DocClient } from "./client.js";
import {
  eventPrimaryKey,
  generateEventKeys,
  timeRangeBounds,
  userEventsPartition,
  userTypePartition,
  type EventKeys,
} from "./keys.js";

/**
 * DynamoDB item for an event
 */
export interface EventItem extends EventKeys {
  data: EventSnapshot;
}

function isConditionalCheckFailure(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "ConditionalCheckFailedException"
  );
}

type StoredItem = Record<string, NativeAttributeValue>;

/**
 * Rebuild an event from its item. A malformed item is an error, never skipped.
 */
function fromItem(item: StoredItem): DiabetesEvent {
  if (!item.data || typeof item.data !== "object") {
    throw new Error(`Stored event ${String(item.pk)} has no data`);
  }
  const result = rehydrateEvent(item.data);
  if (!result.ok) {
    throw new Error(`Invalid stored event ${String(item.pk)}: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Key condition for a user's events in a time window, by type when given
 */
function rangeQueryInput(
  tableName: string,
  userId: UserId,
  query: EventRangeQuery
): QueryCommandInput {
  const bounds = timeRangeBounds(query.start, query.end);
  const byType = query.type !== undefined;

  return {
    TableName: tableName,
    IndexName: byType ? "GSI2" : "GSI1",
    KeyConditionExpression: byType
      ? "gsi2pk = :pk AND gsi2sk BETWEEN :start AND :end"
      : "gsi1pk = :pk AND gsi1sk BETWEEN :start AND :end",
    ExpressionAttributeValues: {
      ":pk": query.type
        ? userTypePartition(userId.value, query.type)
        : userEventsPartition(userId.value),
      ":start": bounds.start,
      ":end": bounds.end,
    },
  };
}

/**
 * Store a new event. Fails if an event with the same id already exists.
 */
export async function putEvent(
  docClient: DocClient,
  tableName: string,
  event: DiabetesEvent,
  signal?: AbortSignal
): Promise<void> {
  const item: EventItem = { ...generateEventKeys(event), data: toSnapshot(event) };

  try {
    await docClient.send(
      new PutCommand({
        TableName: tableName,
        Item: item,
        ConditionExpression: "attribute_not_exists(pk)",
      }),
      { abortSignal: signal }
    );
  } catch (error: unknown) {
    if (isConditionalCheckFailure(error)) {
      throw new Error(`Event ${event.id} already exists`, { cause: error });
    }
    throw error;
  }
}

export async function getEventById(
  docClient: DocClient,
  tableName: string,
  eventId: string,
  signal?: AbortSignal
): Promise<DiabetesEvent | null> {
  const result = await docClient.send(
    new GetCommand({
      TableName: tableName,
      Key: eventPrimaryKey(eventId),
    }),
    { abortSignal: signal }
  );

  if (!result.Item) return null;
  return fromItem(result.Item);
}

/**
 * All of a user's events in a window, oldest first.
 * Follows LastEvaluatedKey until the window is exhausted.
 */
export async function queryEventsByUser(
  docClient: DocClient,
  tableName: string,
  userId: UserId,
  query: EventRangeQuery
): Promise<DiabetesEvent[]> {
  const events: DiabetesEvent[] = [];
  let exclusiveStartKey: StoredItem | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        ...rangeQueryInput(tableName, userId, query),
        ScanIndexForward: true,
        ExclusiveStartKey: exclusiveStartKey,
      }),
      { abortSignal: query.signal }
    );
    events.push(...(result.Items || []).map(fromItem));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return events;
}

export async function countEventsByUser(
  docClient: DocClient,
  tableName: string,
  userId: UserId,
  query: EventRangeQuery
): Promise<number> {
  let count = 0;
  let exclusiveStartKey: StoredItem | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        ...rangeQueryInput(tableName, userId, query),
        Select: "COUNT",
        ExclusiveStartKey: exclusiveStartKey,
      }),
      { abortSignal: query.signal }
    );
    count += result.Count ?? 0;
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return count;
}

/**
 * One page of a user's events, newest first.
 * DynamoDB has no offset, so earlier pages are read and skipped.
 */
export async function queryEventsPage(
  docClient: DocClient,
  tableName: string,
  userId: UserId,
  query: EventRangeQuery,
  page: number,
  pageSize: number
): Promise<DiabetesEvent[]> {
  const skip = (page - 1) * pageSize;
  const wanted = skip + pageSize;
  const items: StoredItem[] = [];
  let exclusiveStartKey: StoredItem | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        ...rangeQueryInput(tableName, userId, query),
        ScanIndexForward: false,
        Limit: wanted - items.length,
        ExclusiveStartKey: exclusiveStartKey,
      }),
      { abortSignal: query.signal }
    );
    items.push(...(result.Items || []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey && items.length < wanted);

  return items.slice(skip, wanted).map(fromItem);
}

/**
 * EventStore backed by a DynamoDB table with GSI1 and GSI2
 */
export function createDynamoEventStore(docClient: DocClient, tableName: string): EventStore {
  return {
    getByUserId: (userId, query) => queryEventsByUser(docClient, tableName, userId, query),
    getById: (eventId, signal) => getEventById(docClient, tableName, eventId, signal),
    countByUserId: (userId, query) => countEventsByUser(docClient, tableName, userId, query),
    getPaged: (userId, query, page, pageSize) =>
      queryEventsPage(docClient, tableName, userId, query, page, pageSize),
    put: (event, signal) => putEvent(docClient, tableName, event, signal),
  };
}
