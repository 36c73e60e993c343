import type { CookieJar } from "@talkback/shared";

export interface ConsentRequest {
  consentUrl: string;
  /** Whole seconds to wait for the consent dialog. Unset waits forever. */
  timeoutSeconds?: number;
  /** Checked between polls only; an accept click in progress is never interrupted. */
  signal?: AbortSignal;
}

/**
 * Accepts the platform's consent dialog and returns the resulting cookies.
 */
export interface ConsentProvider {
  acquireCookies(request: ConsentRequest): Promise<CookieJar>;
}
