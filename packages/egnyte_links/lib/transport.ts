import type { z } from "zod";

import { EgnyteRequestError } from "./errors";

export type EgnyteRequest = {
  method: "GET";
  url: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Sends a built request and returns the body parsed against `schema`.
 * Auth, pooling and cancellation live here, not in the API clients.
 */
export interface HttpTransport {
  send<T>(request: EgnyteRequest, schema: PayloadSchema<T>): Promise<T>;
}

export type FetchTransportOptions = {
  accessToken?: string;
  fetch?: typeof fetch;
  logger?: Pick<Console, "warn">;
};

function extractErrorMessage(text: string): string | null {
  if (!text) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "string") {
      return parsed;
    }
    if (parsed && typeof parsed === "object") {
      const record = parsed as Record<string, unknown>;
      for (const key of ["errorMessage", "error", "message"]) {
        const value = record[key];
        if (typeof value === "string") {
          return value;
        }
      }
    }
  } catch {
    // Not JSON; report the raw text
  }

  return text;
}

export function createFetchTransport({
  accessToken,
  fetch: fetchImpl = fetch,
  logger = console,
}: FetchTransportOptions = {}): HttpTransport {
  return {
    async send<T>(request: EgnyteRequest, schema: PayloadSchema<T>): Promise<T> {
      const headers = new Headers(request.headers ?? {});
      if (!headers.has("Accept")) {
        headers.set("Accept", "application/json");
      }
      if (accessToken && !headers.has("Authorization")) {
        headers.set("Authorization", `Bearer ${accessToken}`);
      }

      const response = await fetchImpl(request.url, {
        method: request.method,
        headers,
        signal: request.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        const detail = extractErrorMessage(text);
        const message = detail
          ? `Egnyte request failed with status ${response.status}: ${detail}`
          : `Egnyte request failed with status ${response.status}`;
        throw new EgnyteRequestError(message, {
          status: response.status,
          url: request.url,
        });
      }

      if (!text) {
        throw new EgnyteRequestError("Egnyte request returned an empty response", {
          status: response.status,
          url: request.url,
        });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(text);
      } catch (error) {
        logger.warn("[EgnyteTransport] Unable to parse JSON payload", {
          url: request.url,
          error,
        });
        throw new EgnyteRequestError("Egnyte request returned malformed JSON", {
          status: response.status,
          url: request.url,
          cause: error,
        });
      }

      return schema.parse(payload);
    },
  };
}
