import { createLogger, type EntityId, type Posting, type Thread } from "@talkback/shared";
import type { JsonSession } from "../http/session";
import { apiUrl, parseResponse } from "../http/parse";
import {
  normalizeTickerPosting,
  normalizeTickerThread,
  postingsPageSchema,
  redContentResponseSchema,
  type RawTickerPosting,
} from "./normalize";

const log = createLogger({ component: "ticker" });

export interface TickerEndpoints {
  apiBase: string;
  /** Large enough that `redcontent` answers with a single page. */
  threadPageSize: number;
}

/**
 * Ticker and thread ids arrive as numbers or numeric strings; the data
 * model stores them as integers.
 */
export function toIntegerId(value: EntityId, label: string): number {
  const n = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isSafeInteger(n) || (typeof value === "string" && value.trim() === "")) {
    throw new RangeError(`${label} must be an integer, got ${JSON.stringify(value)}`);
  }
  return n;
}

export function buildRedContentUrl(apiBase: string, tickerId: number, pageSize: number): string {
  const url = apiUrl(apiBase, "redcontent");
  url.searchParams.set("id", String(tickerId));
  url.searchParams.set("ps", String(pageSize));
  return url.toString();
}

export function buildPostingsPageUrl(
  apiBase: string,
  tickerId: number,
  threadId: number,
  skipTo: EntityId | null = null,
): string {
  const url = apiUrl(apiBase, "postings");
  url.searchParams.set("objectId", String(tickerId));
  url.searchParams.set("redContentId", String(threadId));
  if (skipTo !== null) url.searchParams.set("skipToPostingId", String(skipTo));
  return url.toString();
}

export async function fetchTickerThreads(
  session: JsonSession,
  endpoints: TickerEndpoints,
  tickerId: number,
): Promise<Thread[]> {
  const url = buildRedContentUrl(endpoints.apiBase, tickerId, endpoints.threadPageSize);
  const body = parseResponse(redContentResponseSchema, await session.getJson(url), url);
  log.debug({ tickerId, threads: body.rcs.length }, "Fetched ticker threads");
  return body.rcs.map((raw) => normalizeTickerThread(raw, tickerId));
}

export async function fetchThreadPostingsPage(
  session: JsonSession,
  apiBase: string,
  tickerId: number,
  threadId: number,
  skipTo: EntityId | null = null,
): Promise<RawTickerPosting[]> {
  const url = buildPostingsPageUrl(apiBase, tickerId, threadId, skipTo);
  const body = parseResponse(postingsPageSchema, await session.getJson(url), url);
  return body.p;
}

/**
 * One entry per `pid`. A later duplicate replaces the earlier content but
 * keeps the position where the id was first seen.
 */
export function dedupeByPostingId(postings: readonly RawTickerPosting[]): RawTickerPosting[] {
  // Keyed by string so `2` and `"2"` count as the same posting.
  const byId = new Map<string, RawTickerPosting>();
  for (const posting of postings) {
    byId.set(String(posting.pid), posting);
  }
  return [...byId.values()];
}

/**
 * Page through a ticker thread using the last seen posting id as cursor,
 * until the backend answers with an empty page.
 */
export async function fetchAllThreadPostings(
  session: JsonSession,
  apiBase: string,
  tickerId: number,
  threadId: number,
): Promise<Posting[]> {
  const collected: RawTickerPosting[] = [];
  let requests = 1;
  let page = await fetchThreadPostingsPage(session, apiBase, tickerId, threadId);
  let cursor: EntityId | null = null;

  while (page.length > 0) {
    collected.push(...page);
    const last = page[page.length - 1];
    if (last === undefined) break;

    // A page that does not move the cursor would be requested forever.
    if (cursor !== null && String(last.pid) === String(cursor)) {
      log.warn({ tickerId, threadId, cursor }, "Postings cursor did not advance; stopping");
      break;
    }
    cursor = last.pid;

    page = await fetchThreadPostingsPage(session, apiBase, tickerId, threadId, cursor);
    requests += 1;
  }

  const unique = dedupeByPostingId(collected);
  log.debug(
    { tickerId, threadId, requests, fetched: collected.length, unique: unique.length },
    "Fetched ticker thread postings",
  );
  return unique.map((raw) => normalizeTickerPosting(raw, threadId));
}
