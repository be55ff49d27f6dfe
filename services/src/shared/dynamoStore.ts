import {
  BatchGetCommand,
  DynamoDBDocumentClient,
  GetCommand,
  QueryCommand,
  QueryCommandInput,
  TransactWriteCommand
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { TableNames } from './config';
import {
  approverRequestSortKey,
  docClient,
  MAX_TRANSACTION_WRITES,
  responseSortKey,
  signupSortKey
} from './db';
import { SignupStore, StoreWrite } from './store';
import { ApproverRequest, PersistedSignup } from './types';

export const MEMBERS_BY_EVENT_INDEX = 'members-by-event';
export const REQUESTS_BY_APPROVER_INDEX = 'requests-by-approver';

const BATCH_GET_LIMIT = 100;
const BATCH_GET_ATTEMPTS = 3;

const accountRow = z.object({
  accountId: z.string(),
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  role: z.number().default(0),
  claimed: z.boolean().default(false),
  isGuardian: z.boolean().optional(),
  points: z.number().optional(),
  bids: z.number().optional()
});

const tournamentRow = z.object({
  tournamentId: z.string(),
  name: z.string(),
  startsAt: z.string(),
  signupDeadline: z.string(),
  performanceDeadline: z.string().optional(),
  resultsClosed: z.boolean().optional(),
  questionnaire: z
    .array(
      z.object({
        fieldId: z.string(),
        label: z.string(),
        type: z.string().default('text'),
        required: z.boolean().default(false)
      })
    )
    .default([])
});

const eventRow = z.object({
  eventId: z.string(),
  name: z.string(),
  emoji: z.string().optional(),
  isPartnerEvent: z.boolean().default(false)
});

const membershipRow = z.object({
  accountId: z.string(),
  eventId: z.string(),
  active: z.boolean().default(false)
});

const signupRow = z.object({
  accountId: z.string(),
  tournamentId: z.string(),
  eventId: z.string(),
  going: z.boolean().default(false),
  partnerId: z.string().nullish().transform((v) => v ?? null),
  bringingApprover: z.boolean().default(false),
  approverId: z.string().nullish().transform((v) => v ?? null),
  createdAt: z.string()
});

const approverRequestRow = z.object({
  childId: z.string(),
  tournamentId: z.string(),
  eventId: z.string(),
  approverId: z.string().nullish().transform((v) => v ?? null),
  accepted: z.boolean().default(false),
  decidedAt: z.string().nullish().transform((v) => v ?? null)
});

const guardianLinkRow = z.object({
  childId: z.string(),
  guardianId: z.string()
});

const performanceRow = z.object({
  accountId: z.string(),
  tournamentId: z.string(),
  bid: z.boolean(),
  rank: z.number(),
  stage: z.number(),
  points: z.number(),
  submittedAt: z.string()
});

const signupItem = (signup: PersistedSignup) => ({
  ...signup,
  signupKey: signupSortKey(signup.accountId, signup.eventId)
});

// The approver GSI is keyed on approverId, so an unassigned request must omit it rather than store NULL.
const approverRequestItem = (request: ApproverRequest) => ({
  ...request,
  approverId: request.approverId ?? undefined,
  requestKey: approverRequestSortKey(request.childId, request.eventId)
});

const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

export class DynamoSignupStore implements SignupStore {
  constructor(
    private readonly tables: TableNames,
    private readonly client: DynamoDBDocumentClient = docClient
  ) {}

  async getAccount(accountId: string) {
    const resp = await this.client.send(new GetCommand({ TableName: this.tables.accounts, Key: { accountId } }));
    return resp.Item ? accountRow.parse(resp.Item) : undefined;
  }

  async getAccounts(accountIds: string[]) {
    const unique = Array.from(new Set(accountIds));
    const found: z.infer<typeof accountRow>[] = [];

    for (const ids of chunk(unique, BATCH_GET_LIMIT)) {
      let keys: Array<Record<string, unknown>> = ids.map((accountId) => ({ accountId }));
      for (let attempt = 0; attempt < BATCH_GET_ATTEMPTS && keys.length > 0; attempt++) {
        const resp = await this.client.send(
          new BatchGetCommand({ RequestItems: { [this.tables.accounts]: { Keys: keys } } })
        );
        for (const item of resp.Responses?.[this.tables.accounts] ?? []) {
          found.push(accountRow.parse(item));
        }
        keys = resp.UnprocessedKeys?.[this.tables.accounts]?.Keys ?? [];
      }
      if (keys.length > 0) {
        throw new Error(`BatchGet left ${keys.length} account keys unprocessed`);
      }
    }

    return found;
  }

  async getTournament(tournamentId: string) {
    const resp = await this.client.send(new GetCommand({ TableName: this.tables.tournaments, Key: { tournamentId } }));
    return resp.Item ? tournamentRow.parse(resp.Item) : undefined;
  }

  async getEvent(eventId: string) {
    const resp = await this.client.send(new GetCommand({ TableName: this.tables.events, Key: { eventId } }));
    return resp.Item ? eventRow.parse(resp.Item) : undefined;
  }

  async listMemberships(accountId: string) {
    const items = await this.queryAll({
      TableName: this.tables.memberships,
      KeyConditionExpression: 'accountId = :aid',
      ExpressionAttributeValues: { ':aid': accountId }
    });
    return items.map((item) => membershipRow.parse(item));
  }

  async listEventMembers(eventId: string) {
    const items = await this.queryAll({
      TableName: this.tables.memberships,
      IndexName: MEMBERS_BY_EVENT_INDEX,
      KeyConditionExpression: 'eventId = :eid',
      ExpressionAttributeValues: { ':eid': eventId }
    });
    return items.map((item) => membershipRow.parse(item));
  }

  async getSignup(key: { accountId: string; tournamentId: string; eventId: string }) {
    const resp = await this.client.send(
      new GetCommand({
        TableName: this.tables.signups,
        Key: { tournamentId: key.tournamentId, signupKey: signupSortKey(key.accountId, key.eventId) }
      })
    );
    return resp.Item ? signupRow.parse(resp.Item) : undefined;
  }

  async listSignups(tournamentId: string, accountId: string) {
    const items = await this.queryAll({
      TableName: this.tables.signups,
      KeyConditionExpression: 'tournamentId = :tid AND begins_with(signupKey, :prefix)',
      ExpressionAttributeValues: { ':tid': tournamentId, ':prefix': `${accountId}#` }
    });
    return items.map((item) => signupRow.parse(item));
  }

  async getApproverRequest(key: { childId: string; tournamentId: string; eventId: string }) {
    const resp = await this.client.send(
      new GetCommand({
        TableName: this.tables.approverRequests,
        Key: { tournamentId: key.tournamentId, requestKey: approverRequestSortKey(key.childId, key.eventId) }
      })
    );
    return resp.Item ? approverRequestRow.parse(resp.Item) : undefined;
  }

  async listApproverRequestsForChild(tournamentId: string, childId: string) {
    const items = await this.queryAll({
      TableName: this.tables.approverRequests,
      KeyConditionExpression: 'tournamentId = :tid AND begins_with(requestKey, :prefix)',
      ExpressionAttributeValues: { ':tid': tournamentId, ':prefix': `${childId}#` }
    });
    return items.map((item) => approverRequestRow.parse(item));
  }

  async listApproverRequestsForApprover(approverId: string) {
    const items = await this.queryAll({
      TableName: this.tables.approverRequests,
      IndexName: REQUESTS_BY_APPROVER_INDEX,
      KeyConditionExpression: 'approverId = :aid',
      ExpressionAttributeValues: { ':aid': approverId }
    });
    return items.map((item) => approverRequestRow.parse(item));
  }

  async listGuardianLinks(childId: string) {
    const items = await this.queryAll({
      TableName: this.tables.guardianLinks,
      KeyConditionExpression: 'childId = :cid',
      ExpressionAttributeValues: { ':cid': childId }
    });
    return items.map((item) => guardianLinkRow.parse(item));
  }

  async getPerformance(accountId: string, tournamentId: string) {
    const resp = await this.client.send(
      new GetCommand({ TableName: this.tables.performances, Key: { accountId, tournamentId } })
    );
    return resp.Item ? performanceRow.parse(resp.Item) : undefined;
  }

  async listPerformances(accountId: string) {
    const items = await this.queryAll({
      TableName: this.tables.performances,
      KeyConditionExpression: 'accountId = :aid',
      ExpressionAttributeValues: { ':aid': accountId }
    });
    return items.map((item) => performanceRow.parse(item));
  }

  async transact(writes: StoreWrite[]) {
    if (writes.length === 0) return;
    if (writes.length > MAX_TRANSACTION_WRITES) {
      throw new Error(`transaction of ${writes.length} writes exceeds the limit of ${MAX_TRANSACTION_WRITES}`);
    }

    await this.client.send(
      new TransactWriteCommand({
        TransactItems: writes.map((write) => this.toTransactItem(write))
      })
    );
  }

  private toTransactItem(write: StoreWrite) {
    switch (write.kind) {
      case 'putSignup':
        return { Put: { TableName: this.tables.signups, Item: signupItem(write.signup) } };
      case 'createApproverRequest':
        return {
          Put: {
            TableName: this.tables.approverRequests,
            Item: approverRequestItem(write.request),
            ConditionExpression: 'attribute_not_exists(requestKey)'
          }
        };
      case 'putApproverRequest':
        return { Put: { TableName: this.tables.approverRequests, Item: approverRequestItem(write.request) } };
      case 'replaceResponse':
        // A Put swaps the whole item, so no field of the previous answer survives.
        return {
          Put: {
            TableName: this.tables.responses,
            Item: {
              ...write.response,
              responseKey: responseSortKey(write.response.accountId, write.response.fieldId)
            }
          }
        };
      case 'deleteResponse':
        return {
          Delete: {
            TableName: this.tables.responses,
            Key: {
              tournamentId: write.key.tournamentId,
              responseKey: responseSortKey(write.key.accountId, write.key.fieldId)
            }
          }
        };
      case 'createPerformance':
        return {
          Put: {
            TableName: this.tables.performances,
            Item: write.performance,
            ConditionExpression: 'attribute_not_exists(tournamentId)'
          }
        };
      case 'addAccountTotals':
        return {
          Update: {
            TableName: this.tables.accounts,
            Key: { accountId: write.accountId },
            UpdateExpression: 'ADD #points :points, #bids :bids',
            ConditionExpression: 'attribute_exists(accountId)',
            ExpressionAttributeNames: { '#points': 'points', '#bids': 'bids' },
            ExpressionAttributeValues: { ':points': write.points, ':bids': write.bids }
          }
        };
    }
  }

  private async queryAll(input: QueryCommandInput) {
    const items: Array<Record<string, unknown>> = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;
    do {
      const resp = await this.client.send(new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
      items.push(...(resp.Items ?? []));
      exclusiveStartKey = resp.LastEvaluatedKey;
    } while (exclusiveStartKey);
    return items;
  }
}

export const createDynamoStore = (tables: TableNames): SignupStore => new DynamoSignupStore(tables);
