import { z } from "zod";
import { ConfigError } from "../errors";

const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((v) => v === "true");

const envSchema = z.object({
  TICKER_API_BASE: z.string().url().default("https://www.derstandard.at/jetzt/api/"),
  FORUM_API_BASE: z.string().url().default("https://capi.ds.at/forum-serve-graphql/v1/"),
  ARTICLE_BASE_URL: z.string().url().default("https://www.derstandard.at"),
  CONSENT_URL: z.string().url().default("https://www.derstandard.at/consent/tcf/"),
  TICKER_THREAD_PAGE_SIZE: z.coerce.number().int().positive().default(1_000_000),
  FORUM_REPLY_DEPTH: z.coerce.number().int().min(0).max(64).default(18),
  FORUM_ROOT_POSTINGS_FIRST: z.coerce.number().int().positive().default(100_000),
  // Unset means the consent wait is unbounded.
  CONSENT_TIMEOUT_SECONDS: z.coerce.number().positive().optional(),
  PLAYWRIGHT_HEADLESS: booleanFlag,
});

export interface ClientEnv {
  tickerApiBase: string;
  forumApiBase: string;
  articleBaseUrl: string;
  consentUrl: string;
  tickerThreadPageSize: number;
  forumReplyDepth: number;
  forumRootPostingsFirst: number;
  consentTimeoutSeconds?: number;
  playwrightHeadless: boolean;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim().length === 0 ? undefined : value.trim();
  }
  return out;
}

export function loadClientEnv(env: NodeJS.ProcessEnv = process.env): ClientEnv {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid client configuration: ${detail}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    tickerApiBase: e.TICKER_API_BASE,
    forumApiBase: e.FORUM_API_BASE,
    articleBaseUrl: e.ARTICLE_BASE_URL,
    consentUrl: e.CONSENT_URL,
    tickerThreadPageSize: e.TICKER_THREAD_PAGE_SIZE,
    forumReplyDepth: e.FORUM_REPLY_DEPTH,
    forumRootPostingsFirst: e.FORUM_ROOT_POSTINGS_FIRST,
    consentTimeoutSeconds: e.CONSENT_TIMEOUT_SECONDS,
    playwrightHeadless: e.PLAYWRIGHT_HEADLESS,
  };
}
