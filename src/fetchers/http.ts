import type { z } from "zod";
import { SourceUnavailableError, errorMessage } from "../errors";

export interface RequestOptions {
  /** Label used in error messages, e.g. "Wikipedia". */
  source: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

async function request(url: string, options: RequestOptions): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { method: "GET", headers: options.headers, signal: options.signal });
  } catch (e) {
    throw new SourceUnavailableError(options.source, e);
  }
  if (!response.ok) {
    let detail = "";
    try {
      const body = await response.text();
      if (body) detail = ` - ${body.substring(0, 150)}`;
    } catch (e) {
      detail = ` - ${errorMessage(e)}`;
    }
    throw new SourceUnavailableError(options.source, `HTTP error! status: ${response.status}${detail}`);
  }
  return response;
}

/**
 * GET a JSON document and validate it against `schema`.
 *
 * @throws {SourceUnavailableError} on network errors, non-2xx statuses and payloads that do not
 *   match the schema.
 */
export async function getJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: RequestOptions,
): Promise<z.infer<S>> {
  const response = await request(url, {
    ...options,
    headers: { Accept: "application/json", ...options.headers },
  });
  let body: unknown;
  try {
    body = await response.json();
  } catch (e) {
    throw new SourceUnavailableError(options.source, `Failed to parse response body: ${errorMessage(e)}`);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new SourceUnavailableError(options.source, `Unexpected response shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** GET a text document. */
export async function getText(url: string, options: RequestOptions): Promise<string> {
  const response = await request(url, options);
  try {
    return await response.text();
  } catch (e) {
    throw new SourceUnavailableError(options.source, e);
  }
}
