export {
  fetchForumInfo,
  fetchForumPostings,
  fetchForumPostingTree,
  postingsFromTree,
  type ForumEndpoints,
} from "./fetch";
export {
  flattenPostingTree,
  isPublished,
  normalizeForumPosting,
  parseForumTimestamp,
  PUBLISHED_STATUS,
  type RawForumNode,
} from "./normalize";
export {
  buildArticleUrl,
  buildForumInfoRequest,
  buildGraphQLUrl,
  buildReplySelection,
  buildRootPostingsRequest,
  DEFAULT_REPLY_DEPTH,
  DEFAULT_ROOT_POSTINGS_FIRST,
  type GraphQLRequest,
} from "./query";
