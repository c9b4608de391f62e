// apps/api/src/shared/body.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { z } from "zod";
import { validationError } from "../common/errors";
import { getHeader } from "./ctx";

function rawText(event: APIGatewayProxyEventV2): string {
  if (!event.body) return "";
  return event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
}

/** JSON body validated against a zod schema; an empty body is {}. */
export function parseBody<S extends z.ZodTypeAny>(event: APIGatewayProxyEventV2, schema: S): z.output<S> {
  const text = rawText(event);
  let json: unknown = {};
  if (text.trim()) {
    try {
      json = JSON.parse(text);
    } catch {
      throw validationError("Invalid JSON body");
    }
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    throw validationError(issues.join("; "), { issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })) });
  }
  return parsed.data;
}

export function isJsonRequest(event: APIGatewayProxyEventV2): boolean {
  return (getHeader(event, "content-type") ?? "").toLowerCase().includes("application/json");
}

/**
 * Raw upload bytes. API Gateway base64-encodes binary media types; plain
 * bodies arrive as-is. An x-file-name header, when present, must be .xlsx.
 */
export function binaryBody(event: APIGatewayProxyEventV2): Buffer {
  const fileName = getHeader(event, "x-file-name");
  if (fileName && !fileName.toLowerCase().endsWith(".xlsx")) {
    throw validationError("Only .xlsx files are supported", { fileName });
  }
  if (!event.body) throw validationError("No file uploaded");
  return event.isBase64Encoded ? Buffer.from(event.body, "base64") : Buffer.from(event.body, "binary");
}

export function queryParam(event: APIGatewayProxyEventV2, name: string): string | undefined {
  const v = event.queryStringParameters?.[name];
  return v === undefined || v.trim() === "" ? undefined : v.trim();
}
