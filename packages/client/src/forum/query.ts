import { apiUrl } from "../http/parse";

/**
 * Default reply nesting requested from the forum backend. The web frontend
 * goes to 32; anything deeper than the requested depth is cut off.
 */
export const DEFAULT_REPLY_DEPTH = 18;

export const DEFAULT_ROOT_POSTINGS_FIRST = 100_000;

export interface GraphQLRequest {
  query: string;
  variables: Record<string, unknown>;
}

const POSTING_FIELDS = [
  "id",
  "lifecycleStatus",
  "author { id name }",
  "title",
  "text",
  "reactions { aggregated { name value } }",
  "history { created }",
  "rootPostingId",
].join(" ");

/**
 * Selection set for a posting and `depth` levels of replies below it.
 * Depth 0 selects only the id, which ends the recursion.
 */
export function buildReplySelection(depth: number): string {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`Reply depth must be a non-negative integer, got ${depth}`);
  }
  let selection = "id";
  for (let level = 1; level <= depth; level += 1) {
    selection = `${POSTING_FIELDS} replies { ${selection} }`;
  }
  return selection;
}

export function buildForumInfoRequest(contextUri: string): GraphQLRequest {
  return {
    query:
      "query GetForumInfo($contextUri: String!) { " +
      "getForumByContextUri(contextUri: $contextUri) { id totalPostingCount } }",
    variables: { contextUri },
  };
}

export function buildRootPostingsRequest(
  forumId: string,
  depth: number = DEFAULT_REPLY_DEPTH,
  first: number = DEFAULT_ROOT_POSTINGS_FIRST,
): GraphQLRequest {
  return {
    query:
      "query ThreadsByForumQuery($id: String!, $first: Int) { " +
      "getForumRootPostings(getForumRootPostingsParams: { forumId: $id, first: $first }) { " +
      `edges { node { ${buildReplySelection(depth)} } } } }`,
    variables: { id: forumId, first },
  };
}

/** The forum backend takes GraphQL over GET, with JSON-encoded variables. */
export function buildGraphQLUrl(apiBase: string, request: GraphQLRequest): string {
  const url = apiUrl(apiBase, "");
  url.searchParams.set("variables", JSON.stringify(request.variables));
  url.searchParams.set("query", request.query);
  return url.toString();
}

/** Canonical article URL the forum is attached to. */
export function buildArticleUrl(articleBaseUrl: string, articleId: string | number): string {
  return apiUrl(articleBaseUrl, `story/${encodeURIComponent(String(articleId))}`).toString();
}
