import {
  createLogger,
  MalformedResponseError,
  type ForumInfo,
  type Posting,
} from "@talkback/shared";
import type { JsonSession } from "../http/session";
import { parseResponse } from "../http/parse";
import {
  flattenPostingTree,
  forumInfoResponseSchema,
  isPublished,
  normalizeForumPosting,
  rootPostingsResponseSchema,
  type RawForumNode,
} from "./normalize";
import {
  buildArticleUrl,
  buildForumInfoRequest,
  buildGraphQLUrl,
  buildRootPostingsRequest,
  type GraphQLRequest,
} from "./query";

const log = createLogger({ component: "forum" });

export interface ForumEndpoints {
  apiBase: string;
  articleBaseUrl: string;
  replyDepth: number;
  rootPostingsFirst: number;
}

function graphQLErrorMessages(body: unknown): string[] {
  if (!body || typeof body !== "object" || !("errors" in body)) return [];
  const { errors } = body;
  if (!Array.isArray(errors)) return [];
  return errors.map((e: unknown) =>
    e && typeof e === "object" && "message" in e && typeof e.message === "string"
      ? e.message
      : JSON.stringify(e),
  );
}

async function executeGraphQL(
  session: JsonSession,
  apiBase: string,
  request: GraphQLRequest,
): Promise<{ url: string; body: unknown }> {
  const url = buildGraphQLUrl(apiBase, request);
  const body = await session.getJson(url);

  const errors = graphQLErrorMessages(body);
  if (errors.length > 0) {
    const data = body && typeof body === "object" && "data" in body ? body.data : null;
    if (data === null || data === undefined) {
      throw new MalformedResponseError(`GraphQL request failed: ${errors.join("; ")}`, url, [
        "errors",
      ]);
    }
    log.warn({ url, errors }, "GraphQL response carried errors alongside data");
  }
  return { url, body };
}

export async function fetchForumInfo(
  session: JsonSession,
  endpoints: ForumEndpoints,
  articleId: string | number,
): Promise<ForumInfo> {
  const contextUri = buildArticleUrl(endpoints.articleBaseUrl, articleId);
  const { url, body } = await executeGraphQL(
    session,
    endpoints.apiBase,
    buildForumInfoRequest(contextUri),
  );
  const forum = parseResponse(forumInfoResponseSchema, body, url).data.getForumByContextUri;
  if (forum === null) {
    throw new MalformedResponseError(`No forum found for ${contextUri}`, url, [
      "data",
      "getForumByContextUri",
    ]);
  }
  return { forumId: forum.id, totalPostingCount: forum.totalPostingCount ?? null };
}

export async function fetchForumPostingTree(
  session: JsonSession,
  endpoints: ForumEndpoints,
  forumId: string,
): Promise<{ url: string; roots: RawForumNode[] }> {
  const { url, body } = await executeGraphQL(
    session,
    endpoints.apiBase,
    buildRootPostingsRequest(forumId, endpoints.replyDepth, endpoints.rootPostingsFirst),
  );
  const parsed = parseResponse(rootPostingsResponseSchema, body, url);
  return { url, roots: parsed.data.getForumRootPostings.edges.map((edge) => edge.node) };
}

/**
 * Flatten a fetched reply tree and keep the published postings only.
 * Dropped postings can still be referenced as `parentId` by others.
 */
export function postingsFromTree(roots: readonly RawForumNode[], url: string): Posting[] {
  return flattenPostingTree(roots)
    .filter(isPublished)
    .map((node) => normalizeForumPosting(node, url));
}

export async function fetchForumPostings(
  session: JsonSession,
  endpoints: ForumEndpoints,
  articleId: string | number,
): Promise<Posting[]> {
  const { forumId, totalPostingCount } = await fetchForumInfo(session, endpoints, articleId);
  const { url, roots } = await fetchForumPostingTree(session, endpoints, forumId);
  const postings = postingsFromTree(roots, url);
  log.debug(
    { articleId, forumId, roots: roots.length, postings: postings.length, totalPostingCount },
    "Fetched forum postings",
  );
  return postings;
}
