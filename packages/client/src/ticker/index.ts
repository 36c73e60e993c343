export {
  buildPostingsPageUrl,
  buildRedContentUrl,
  dedupeByPostingId,
  fetchAllThreadPostings,
  fetchThreadPostingsPage,
  fetchTickerThreads,
  toIntegerId,
  type TickerEndpoints,
} from "./fetch";
export {
  normalizeTickerPosting,
  normalizeTickerThread,
  parseTickerTimestamp,
  type RawTickerPosting,
  type RawTickerThread,
} from "./normalize";
