import { MalformedResponseError, ProtocolError } from "../errors";
import type { ApiResponse } from "../types";

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a raw response body and classifies it.
 *
 * @throws {MalformedResponseError} body is not a JSON object
 * @throws {ProtocolError} body has `status: "error"`
 */
export function interpretResponse(raw: string): ApiResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedResponseError("Response body is not valid JSON", raw, {
      cause: error,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new MalformedResponseError("Response body is not a JSON object", raw);
  }

  if (parsed["status"] === "error") {
    const error = parsed["error"];
    throw new ProtocolError(
      typeof error === "string" ? error : JSON.stringify(error ?? null),
      parsed
    );
  }

  return parsed;
}
