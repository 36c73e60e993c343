import {
  createLogger,
  loadClientEnv,
  loadDotEnvIfPresent,
  type ClientEnv,
  type CookieJar,
  type EntityId,
  type ForumInfo,
  type Posting,
  type Thread,
} from "@talkback/shared";
import type { Dispatcher } from "undici";
import { PlaywrightConsentProvider } from "./consent/playwright";
import type { ConsentProvider } from "./consent/types";
import { fetchForumInfo, fetchForumPostings, type ForumEndpoints } from "./forum/fetch";
import { HttpSession, type JsonSession } from "./http/session";
import {
  fetchAllThreadPostings,
  fetchTickerThreads,
  toIntegerId,
  type TickerEndpoints,
} from "./ticker/fetch";

const log = createLogger({ component: "client" });

export interface DiscussionClientOptions {
  /** Defaults to `loadClientEnv()` after reading the project's `.env` files. */
  env?: ClientEnv;
  /** Defaults to a Playwright-driven Chromium. */
  consentProvider?: ConsentProvider;
  /** Dispatcher for sessions the client opens itself. Left open by the client. */
  dispatcher?: Dispatcher;
}

export interface RequestOptions {
  /** Reused as is and never closed by the client. */
  session?: JsonSession;
}

export interface RefreshConsentOptions {
  /** Overrides `CONSENT_TIMEOUT_SECONDS` for this refresh. */
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

/**
 * Entry point for ticker and forum discussions. Holds the consent cookies
 * and opens one HTTP session per call unless the caller brings one.
 */
export class DiscussionClient {
  private readonly env: ClientEnv;
  private readonly consentProvider: ConsentProvider;
  private readonly dispatcher: Dispatcher | undefined;
  private cookieJar: CookieJar | null = null;

  constructor(options: DiscussionClientOptions = {}) {
    this.env = options.env ?? DiscussionClient.envFromProcess();
    this.consentProvider =
      options.consentProvider ??
      new PlaywrightConsentProvider({ headless: this.env.playwrightHeadless });
    this.dispatcher = options.dispatcher;
  }

  private static envFromProcess(): ClientEnv {
    loadDotEnvIfPresent();
    return loadClientEnv();
  }

  /** Copy of the current consent cookies, or null before the first refresh. */
  get cookies(): CookieJar | null {
    return this.cookieJar ? { ...this.cookieJar } : null;
  }

  get hasConsentCookies(): boolean {
    return this.cookieJar !== null;
  }

  /** A session carrying the current cookies. Closing it is up to the caller. */
  openSession(): HttpSession {
    return new HttpSession({ cookies: this.cookieJar, dispatcher: this.dispatcher });
  }

  private get tickerEndpoints(): TickerEndpoints {
    return { apiBase: this.env.tickerApiBase, threadPageSize: this.env.tickerThreadPageSize };
  }

  private get forumEndpoints(): ForumEndpoints {
    return {
      apiBase: this.env.forumApiBase,
      articleBaseUrl: this.env.articleBaseUrl,
      replyDepth: this.env.forumReplyDepth,
      rootPostingsFirst: this.env.forumRootPostingsFirst,
    };
  }

  private async withSession<T>(
    session: JsonSession | undefined,
    fn: (session: JsonSession) => Promise<T>,
  ): Promise<T> {
    if (session) return fn(session);

    const owned = this.openSession();
    try {
      return await fn(owned);
    } finally {
      await owned.close();
    }
  }

  async listTickerThreads(tickerId: EntityId, options: RequestOptions = {}): Promise<Thread[]> {
    const id = toIntegerId(tickerId, "tickerId");
    return this.withSession(options.session, (session) =>
      fetchTickerThreads(session, this.tickerEndpoints, id),
    );
  }

  async listTickerThreadPostings(
    tickerId: EntityId,
    threadId: EntityId,
    options: RequestOptions = {},
  ): Promise<Posting[]> {
    const ticker = toIntegerId(tickerId, "tickerId");
    const thread = toIntegerId(threadId, "threadId");
    return this.withSession(options.session, (session) =>
      fetchAllThreadPostings(session, this.env.tickerApiBase, ticker, thread),
    );
  }

  async getForumInfo(articleId: EntityId, options: RequestOptions = {}): Promise<ForumInfo> {
    return this.withSession(options.session, (session) =>
      fetchForumInfo(session, this.forumEndpoints, articleId),
    );
  }

  async listForumPostings(articleId: EntityId, options: RequestOptions = {}): Promise<Posting[]> {
    return this.withSession(options.session, (session) =>
      fetchForumPostings(session, this.forumEndpoints, articleId),
    );
  }

  /**
   * Accept the consent dialog in a real browser and swap in the new cookies.
   * On failure the previous cookies stay in place.
   */
  async refreshConsentCookies(options: RefreshConsentOptions = {}): Promise<void> {
    const timeoutSeconds = options.timeoutSeconds ?? this.env.consentTimeoutSeconds;
    log.info({ consentUrl: this.env.consentUrl, timeoutSeconds }, "Refreshing consent cookies");

    const cookies = await this.consentProvider.acquireCookies({
      consentUrl: this.env.consentUrl,
      timeoutSeconds,
      signal: options.signal,
    });

    this.cookieJar = { ...cookies };
    log.info({ cookieCount: Object.keys(cookies).length }, "Consent cookies refreshed");
  }
}
