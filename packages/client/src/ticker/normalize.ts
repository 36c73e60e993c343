import type { Posting, Thread } from "@talkback/shared";
import { z } from "zod";
import { textOrNull } from "../http/parse";

const entityIdSchema = z.union([z.number(), z.string()]);

const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid timestamp" });

// Live-blog entry as returned by `redcontent`.
export const rawTickerThreadSchema = z.object({
  id: entityIdSchema,
  ctd: timestampSchema,
  hl: z.string().nullish(),
  cm: z.string().nullish(),
  cid: entityIdSchema,
  cn: z.string(),
  vp: z.number().int(),
  vn: z.number().int(),
});
export type RawTickerThread = z.infer<typeof rawTickerThreadSchema>;

export const redContentResponseSchema = z.object({
  rcs: z.array(rawTickerThreadSchema),
});

// Reply as returned by `postings`.
export const rawTickerPostingSchema = z.object({
  pid: entityIdSchema,
  ppid: entityIdSchema.nullish(),
  cid: entityIdSchema,
  cn: z.string(),
  cd: timestampSchema,
  hl: z.string().nullish(),
  tx: z.string().nullish(),
  vp: z.number().int(),
  vn: z.number().int(),
});
export type RawTickerPosting = z.infer<typeof rawTickerPostingSchema>;

export const postingsPageSchema = z.object({
  p: z.array(rawTickerPostingSchema),
});

/** Ticker timestamps always carry an offset; the result is the UTC instant. */
export function parseTickerTimestamp(value: string): Date {
  return new Date(Date.parse(value));
}

export function normalizeTickerThread(raw: RawTickerThread, tickerId: number): Thread {
  return {
    threadId: raw.id,
    tickerId,
    published: parseTickerTimestamp(raw.ctd),
    title: textOrNull(raw.hl),
    message: textOrNull(raw.cm),
    user: { userId: String(raw.cid), name: raw.cn },
    upvotes: raw.vp,
    downvotes: raw.vn,
  };
}

export function normalizeTickerPosting(raw: RawTickerPosting, threadId: number): Posting {
  return {
    postingId: raw.pid,
    parentId: raw.ppid ?? null,
    user: { userId: String(raw.cid), name: raw.cn },
    threadId,
    published: parseTickerTimestamp(raw.cd),
    title: textOrNull(raw.hl),
    message: textOrNull(raw.tx),
    upvotes: raw.vp,
    downvotes: raw.vn,
  };
}
