// apps/api/src/inventory/repo-dynamo.ts
// Single-table layout, partition = store id:
//   item#<id>                  Item
//   itemName#<normalized name> name lock → itemId
//   category#<id>              Category
//   movement#<ISO at>#<id>     Movement (sorts by time)
import { TransactionCanceledException } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  TransactWriteCommand,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
} from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { conflict, duplicateName } from "../common/errors";
import { VERSION_CONFLICT, type InventoryRepo } from "./repo";
import {
  MOVEMENT_ACTIONS,
  nameKey,
  type Category,
  type Item,
  type ItemChange,
  type Movement,
  type MovementQuery,
} from "./types";

type TransactItem = NonNullable<ConstructorParameters<typeof TransactWriteCommand>[0]["TransactItems"]>[number];

const ItemRecord = z.object({
  id: z.string(),
  name: z.string(),
  category: z.string(),
  unit: z.string(),
  quantity: z.number(),
  unitPrice: z.number().nullable().default(null),
  totalPurchased: z.number().default(0),
  version: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const MovementRecord = z.object({
  id: z.string(),
  itemId: z.string(),
  itemName: z.string(),
  category: z.string(),
  unit: z.string(),
  action: z.enum(MOVEMENT_ACTIONS),
  qty: z.number(),
  unitPrice: z.number().nullable().default(null),
  amount: z.number().nullable().default(null),
  vendor: z.string().nullable().default(null),
  note: z.string().nullable().default(null),
  actor: z.string(),
  at: z.string(),
});

const CategoryRecord = z.object({
  id: z.string(),
  name: z.string(),
  icon: z.string(),
  createdAt: z.string(),
});

const LockRecord = z.object({ itemId: z.string() });

const MAX_SCAN_PAGES = 20;

export class DynamoInventoryRepo implements InventoryRepo {
  constructor(
    private readonly ddb: DynamoDBDocumentClient,
    private readonly table: string,
    private readonly storeId: string
  ) {}

  private key(sk: string) {
    return { pk: this.storeId, sk };
  }

  private async queryAll(prefix: string): Promise<Record<string, unknown>[]> {
    const out: Record<string, unknown>[] = [];
    let next: Record<string, unknown> | undefined;
    do {
      const res = await this.ddb.send(
        new QueryCommand({
          TableName: this.table,
          KeyConditionExpression: "#pk = :pk AND begins_with(#sk, :prefix)",
          ExpressionAttributeNames: { "#pk": "pk", "#sk": "sk" },
          ExpressionAttributeValues: { ":pk": this.storeId, ":prefix": prefix },
          ExclusiveStartKey: next,
          ConsistentRead: true,
        })
      );
      out.push(...(res.Items ?? []));
      next = res.LastEvaluatedKey;
    } while (next);
    return out;
  }

  async getItem(id: string): Promise<Item | null> {
    const res = await this.ddb.send(
      new GetCommand({ TableName: this.table, Key: this.key(`item#${id}`), ConsistentRead: true })
    );
    return res.Item ? ItemRecord.parse(res.Item) : null;
  }

  async findItemByName(name: string): Promise<Item | null> {
    const res = await this.ddb.send(
      new GetCommand({ TableName: this.table, Key: this.key(`itemName#${nameKey(name)}`), ConsistentRead: true })
    );
    if (!res.Item) return null;
    return this.getItem(LockRecord.parse(res.Item).itemId);
  }

  async listItems(): Promise<Item[]> {
    const rows = await this.queryAll("item#");
    return rows.map((r) => ItemRecord.parse(r));
  }

  async commitItem({ before, after, movement }: ItemChange): Promise<void> {
    const ops: TransactItem[] = [];
    let nameLockIndex = -1;
    const versionGuard = (version: number) => ({
      ConditionExpression: "#v = :v",
      ExpressionAttributeNames: { "#v": "version" },
      ExpressionAttributeValues: { ":v": version },
    });

    if (after) {
      ops.push({
        Put: {
          TableName: this.table,
          Item: { ...this.key(`item#${after.id}`), docType: "item", ...after },
          ...(before ? versionGuard(before.version) : { ConditionExpression: "attribute_not_exists(sk)" }),
        },
      });
    } else if (before) {
      ops.push({
        Delete: { TableName: this.table, Key: this.key(`item#${before.id}`), ...versionGuard(before.version) },
      });
    }

    const oldKey = before ? nameKey(before.name) : null;
    const newKey = after ? nameKey(after.name) : null;
    if (oldKey !== newKey) {
      if (oldKey) ops.push({ Delete: { TableName: this.table, Key: this.key(`itemName#${oldKey}`) } });
      if (newKey && after) {
        nameLockIndex = ops.length;
        ops.push({
          Put: {
            TableName: this.table,
            Item: { ...this.key(`itemName#${newKey}`), docType: "itemName", itemId: after.id },
            ConditionExpression: "attribute_not_exists(sk)",
          },
        });
      }
    }

    if (movement) {
      ops.push({
        Put: {
          TableName: this.table,
          Item: { ...this.key(`movement#${movement.at}#${movement.id}`), docType: "movement", ...movement },
          ConditionExpression: "attribute_not_exists(sk)",
        },
      });
    }

    if (ops.length === 0) return;

    try {
      await this.ddb.send(new TransactWriteCommand({ TransactItems: ops }));
    } catch (err) {
      if (err instanceof TransactionCanceledException) {
        const reasons = err.CancellationReasons ?? [];
        if (nameLockIndex >= 0 && reasons[nameLockIndex]?.Code === "ConditionalCheckFailed" && after) {
          throw duplicateName(after.name);
        }
        if (reasons.some((r) => r.Code === "ConditionalCheckFailed")) {
          throw conflict(VERSION_CONFLICT, { id: before?.id ?? after?.id });
        }
      }
      throw err;
    }
  }

  async listMovements({ action, fromAt, toAt, limit }: MovementQuery): Promise<Movement[]> {
    const matches: Movement[] = [];
    let next: Record<string, unknown> | undefined;

    for (let i = 0; i < MAX_SCAN_PAGES && matches.length < limit; i++) {
      const input: QueryCommandInput = {
        TableName: this.table,
        KeyConditionExpression: "#pk = :pk AND #sk BETWEEN :from AND :to",
        ExpressionAttributeNames: { "#pk": "pk", "#sk": "sk", ...(action ? { "#a": "action" } : {}) },
        ExpressionAttributeValues: {
          ":pk": this.storeId,
          ":from": `movement#${fromAt}`,
          ":to": `movement#${toAt}`,
          ...(action ? { ":a": action } : {}),
        },
        ...(action ? { FilterExpression: "#a = :a" } : {}),
        ScanIndexForward: false, // newest first
        ExclusiveStartKey: next,
        Limit: Math.min(500, Math.max(50, limit * 2)),
      };
      const res = await this.ddb.send(new QueryCommand(input));
      for (const row of res.Items ?? []) matches.push(MovementRecord.parse(row));
      next = res.LastEvaluatedKey;
      if (!next) break;
    }
    return matches.slice(0, limit);
  }

  async listCategories(): Promise<Category[]> {
    const rows = await this.queryAll("category#");
    return rows.map((r) => CategoryRecord.parse(r));
  }

  async getCategory(id: string): Promise<Category | null> {
    const res = await this.ddb.send(new GetCommand({ TableName: this.table, Key: this.key(`category#${id}`) }));
    return res.Item ? CategoryRecord.parse(res.Item) : null;
  }

  async putCategory(category: Category): Promise<void> {
    await this.ddb.send(
      new PutCommand({
        TableName: this.table,
        Item: { ...this.key(`category#${category.id}`), docType: "category", ...category },
      })
    );
  }

  async deleteCategory(id: string): Promise<void> {
    await this.ddb.send(new DeleteCommand({ TableName: this.table, Key: this.key(`category#${id}`) }));
  }
}
