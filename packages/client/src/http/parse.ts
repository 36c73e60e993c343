import { MalformedResponseError } from "@talkback/shared";
import type { z } from "zod";

/**
 * Validate a decoded response body against `schema`.
 * The first failing field ends up in the error's `path`.
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  url: string,
  basePath: Array<string | number> = [],
): z.output<T> {
  const result = schema.safeParse(body);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = [...basePath, ...(issue?.path ?? [])];
  const where = path.length > 0 ? path.join(".") : "<root>";
  throw new MalformedResponseError(
    `Unexpected response from ${url} at ${where}: ${issue?.message ?? "invalid shape"}`,
    url,
    path,
    { cause: result.error },
  );
}

/** Empty strings count as absent, like the backends treat them. */
export function textOrNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

/** Join `tail` onto an API base, tolerating a missing trailing slash on the base. */
export function apiUrl(base: string, tail: string): URL {
  const normalized = base.endsWith("/") ? base : `${base}/`;
  return new URL(tail, normalized);
}
