import type { EntityId, Posting } from "@talkback/shared";
import { z } from "zod";
import { parseResponse, textOrNull } from "../http/parse";

export const PUBLISHED_STATUS = "Published";

const entityIdSchema = z.union([z.string(), z.number()]);

/**
 * A node of the reply tree as delivered. Only the fields that drive the walk
 * and the `Published` filter are checked here; the rest is validated once a
 * node survives the filter, so removed postings with null authors or
 * timestamps are skipped instead of failing the whole tree.
 */
export interface RawForumNode {
  id: EntityId;
  lifecycleStatus?: string | null;
  author?: unknown;
  title?: unknown;
  text?: unknown;
  reactions?: unknown;
  history?: unknown;
  rootPostingId?: unknown;
  replies?: RawForumNode[] | null;
}

export const rawForumNodeSchema: z.ZodType<RawForumNode> = z.lazy(() =>
  z.object({
    id: entityIdSchema,
    lifecycleStatus: z.string().nullish(),
    author: z.unknown(),
    title: z.unknown(),
    text: z.unknown(),
    reactions: z.unknown(),
    history: z.unknown(),
    rootPostingId: z.unknown(),
    replies: z.array(rawForumNodeSchema).nullish(),
  }),
);

export const forumInfoResponseSchema = z.object({
  data: z.object({
    getForumByContextUri: z
      .object({
        id: z.string(),
        totalPostingCount: z.number().int().nullish(),
      })
      .nullable(),
  }),
});

export const rootPostingsResponseSchema = z.object({
  data: z.object({
    getForumRootPostings: z.object({
      edges: z.array(z.object({ node: rawForumNodeSchema })),
    }),
  }),
});

// Offset after a time of day: `+01`, `+0100` or `+01:00`.
const NUMERIC_OFFSET = /(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)([+-])(\d{2}):?(\d{2})?$/;

/**
 * Forum timestamps are used as delivered. A value without offset is read
 * as UTC rather than host-local time.
 */
export function parseForumTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  let iso: string;
  if (/z$/i.test(trimmed)) {
    iso = trimmed;
  } else if (NUMERIC_OFFSET.test(trimmed)) {
    iso = trimmed.replace(
      NUMERIC_OFFSET,
      (_match, time: string, sign: string, hours: string, minutes: string | undefined) =>
        `${time}${sign}${hours}:${minutes ?? "00"}`,
    );
  } else {
    iso = `${trimmed}Z`;
  }
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : new Date(ms);
}

const aggregateSchema = z.object({ name: z.string().nullish(), value: z.number().int() });

// Fields a published posting must carry to become a Posting.
const publishedNodeSchema = z.object({
  id: entityIdSchema,
  author: z.object({ id: entityIdSchema, name: z.string() }),
  title: z.string().nullish(),
  text: z.string().nullish(),
  reactions: z.object({
    // Positional contract: [0] upvotes, [1] downvotes.
    aggregated: z.tuple([aggregateSchema, aggregateSchema]).rest(aggregateSchema),
  }),
  history: z.object({
    created: z.string().transform((value, ctx) => {
      const published = parseForumTimestamp(value);
      if (published === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid timestamp" });
        return z.NEVER;
      }
      return published;
    }),
  }),
  rootPostingId: entityIdSchema,
});

/**
 * Pre-order walk: every node precedes its descendants, siblings keep the
 * backend's order.
 */
export function flattenPostingTree<T extends { replies?: readonly T[] | null }>(
  nodes: readonly T[],
): T[] {
  const out: T[] = [];
  const visit = (node: T): void => {
    out.push(node);
    for (const reply of node.replies ?? []) visit(reply);
  };
  for (const node of nodes) visit(node);
  return out;
}

/**
 * Map a published tree node to a Posting. All postings of a thread point at
 * the thread's root posting, not at their direct parent.
 */
export function normalizeForumPosting(node: RawForumNode, url: string): Posting {
  const p = parseResponse(publishedNodeSchema, node, url, ["posting", String(node.id)]);
  const [up, down] = p.reactions.aggregated;

  return {
    postingId: p.id,
    parentId: p.id === p.rootPostingId ? null : p.rootPostingId,
    user: { userId: String(p.author.id), name: p.author.name },
    threadId: null,
    published: p.history.created,
    title: textOrNull(p.title),
    message: textOrNull(p.text),
    upvotes: up.value,
    downvotes: down.value,
  };
}

export function isPublished(node: RawForumNode): boolean {
  return node.lifecycleStatus === PUBLISHED_STATUS;
}
