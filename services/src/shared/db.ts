import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

const ddbClient = new DynamoDBClient({});

export const docClient = DynamoDBDocumentClient.from(ddbClient, {
  marshallOptions: { removeUndefinedValues: true }
});

export const KEY_SEPARATOR = '#';

export const compositeKey = (...parts: string[]) => parts.join(KEY_SEPARATOR);

// Sort keys lead with the account so `begins_with(<accountId>#)` lists one member's rows.
export const signupSortKey = (accountId: string, eventId: string) => compositeKey(accountId, eventId);
export const approverRequestSortKey = (childId: string, eventId: string) => compositeKey(childId, eventId);
export const responseSortKey = (accountId: string, fieldId: string) => compositeKey(accountId, fieldId);

// DynamoDB caps a single TransactWriteItems call at 100 actions.
export const MAX_TRANSACTION_WRITES = 100;
