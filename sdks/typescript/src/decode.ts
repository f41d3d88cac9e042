import type { ZodIssue } from "zod";
import { DecodeError, HttpStatusError } from "./errors";
import type { DecodeIssue } from "./errors";
import type { InboundResponse, Schema } from "./types";

const MAX_ERROR_BODY_LENGTH = 500;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Checks the status and, when a schema is given, parses the JSON body into
 * it. The response is closed exactly once whichever way this returns.
 */
export function decodeResponse(response: InboundResponse): Promise<void>;
export function decodeResponse<T>(response: InboundResponse, schema: Schema<T>): Promise<T>;
export async function decodeResponse<T>(response: InboundResponse, schema?: Schema<T>): Promise<T | void> {
  try {
    if (!isSuccessStatus(response.status)) {
      throw new HttpStatusError({
        httpStatus: response.status,
        statusText: response.statusText,
        url: response.url,
        body: await readErrorBody(response),
      });
    }
    if (!schema) {
      return;
    }
    return parseBody(await response.text(), schema);
  } finally {
    await response.close();
  }
}

export function parseBody<T>(text: string, schema: Schema<T>): T {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError({ message: `Response body is not valid JSON: ${reason}`, cause: error });
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map(toDecodeIssue);
    const summary = issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ");
    throw new DecodeError({ message: `Response body has an unexpected shape: ${summary}`, issues, cause: result.error });
  }
  return result.data;
}

function toDecodeIssue(issue: ZodIssue): DecodeIssue {
  return { path: issue.path.join("."), message: issue.message };
}

async function readErrorBody(response: InboundResponse): Promise<string> {
  try {
    const text = await response.text();
    return text.replace(/<[^>]*>/g, "").slice(0, MAX_ERROR_BODY_LENGTH);
  } catch {
    return "";
  }
}
