export {
  DiscussionClient,
  type DiscussionClientOptions,
  type RefreshConsentOptions,
  type RequestOptions,
} from "./client";
export {
  formatCookieHeader,
  HttpSession,
  type HttpSessionOptions,
  type JsonSession,
} from "./http/session";
export * from "./consent";
export * from "./forum";
export * from "./ticker";
