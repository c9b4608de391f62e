import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

export function createDocumentClient(opts: { region: string; endpoint?: string }) {
  const ddbClient = new DynamoDBClient({ region: opts.region, endpoint: opts.endpoint });
  return DynamoDBDocumentClient.from(ddbClient, {
    marshallOptions: { convertClassInstanceToMap: true, removeUndefinedValues: true, convertEmptyValues: false },
    unmarshallOptions: { wrapNumbers: false },
  });
}
