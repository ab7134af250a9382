/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

/**
 * The subset of the document client the storage functions call
 */
export type DocClient = Pick<DynamoDBDocumentClient, "send">;

/**
 * Create a DynamoDB Document Client with sensible defaults.
 * Region comes from the caller, or AWS_REGION, falling back to us-east-1
 * for local development.
 */
export function createDocClient(region: string = process.env.AWS_REGION ?? "us-east-1"): DynamoDBDocumentClient {
  const client = new DynamoDBClient({ region });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
