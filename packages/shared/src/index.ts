export type { CookieJar, EntityId, ForumInfo, Posting, Thread, User } from "./types/discussion";
export {
  ConfigError,
  ConsentTimeoutError,
  MalformedResponseError,
  NetworkError,
  TalkbackError,
  isTalkbackError,
  type TalkbackErrorCode,
} from "./errors";
export { createLogger, type LoggerOptions } from "./logging";
export { loadClientEnv, type ClientEnv } from "./config/runtime_env";
export { findProjectRoot, loadDotEnvIfPresent } from "./config/load_dotenv";
