/** Ticker ids are numeric, forum ids are opaque strings. */
export type EntityId = number | string;

/** Cookie name -> value, as sent in a `Cookie` header. */
export type CookieJar = Record<string, string>;

export interface User {
  userId: string;
  name: string;
}

/** One live-blog entry opened for discussion. */
export interface Thread {
  threadId: EntityId;
  tickerId: number;
  published: Date; // UTC instant
  title: string | null;
  message: string | null;
  user: User;
  upvotes: number;
  downvotes: number;
}

/** A comment, either a ticker reply or a forum comment/reply. */
export interface Posting {
  postingId: EntityId;
  parentId: EntityId | null; // null = root
  user: User;
  threadId: number | null; // null for forum postings
  published: Date;
  title: string | null;
  message: string | null;
  upvotes: number;
  downvotes: number;
}

export interface ForumInfo {
  forumId: string;
  totalPostingCount: number | null;
}
