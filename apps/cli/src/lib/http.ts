/**
 * HTTP helpers — thin wrappers around native fetch for the node API.
 *
 * Responses are checked against a typebox schema before they reach a
 * command. A non-2xx answer becomes a NodeRequestError carrying the node's
 * error code.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

export class NodeRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    readonly detail: unknown,
  ) {
    super(`${status} ${code}${detail === undefined ? "" : ` ${JSON.stringify(detail)}`}`);
    this.name = "NodeRequestError";
  }
}

function errorBody(body: unknown): { code: string; detail: unknown } {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return { code: body.error, detail: "detail" in body ? body.detail : undefined };
  }
  return { code: "http_error", detail: body };
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return text;
    throw err;
  }
}

async function request<S extends TSchema>(
  url: string,
  schema: S,
  init?: RequestInit,
): Promise<Static<S>> {
  const res = await fetch(url, { ...init, signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
  const body = await readBody(res);
  if (!res.ok) {
    const { code, detail } = errorBody(body);
    throw new NodeRequestError(res.status, code, detail);
  }
  if (!Value.Check(schema, body)) {
    throw new Error(`Unexpected response from ${url}`);
  }
  return body;
}

export async function httpGet<S extends TSchema>(url: string, schema: S): Promise<Static<S>> {
  return request(url, schema);
}

export async function httpPost<S extends TSchema>(
  url: string,
  data: unknown,
  schema: S,
): Promise<Static<S>> {
  return request(url, schema, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(data),
  });
}
