import { ConsentTimeoutError, createLogger, type CookieJar } from "@talkback/shared";
import { chromium, type Browser, type Locator, type Page } from "playwright";
import type { ConsentProvider, ConsentRequest } from "./types";

const log = createLogger({ component: "consent" });

export const CONSENT_FRAME_TITLE = "SP Consent Message";
export const ACCEPT_BUTTON_TITLE = "Einverstanden";
const POLL_INTERVAL_MS = 1000;

export interface PlaywrightConsentOptions {
  headless?: boolean;
  frameTitle?: string;
  acceptButtonTitle?: string;
}

/** Number of one-second polls for a timeout given in seconds, rounded half up. */
export function pollAttempts(timeoutSeconds: number | undefined): number {
  if (timeoutSeconds === undefined) return Number.POSITIVE_INFINITY;
  return Math.max(0, Math.floor(timeoutSeconds + 0.5));
}

async function closeBrowserSafely(browser: Browser): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    log.debug({ error }, "Error closing consent browser (non-fatal)");
  }
}

/**
 * Every consent frame is searched; frame locators are strict, so they are
 * addressed by index.
 */
async function findAcceptButton(
  page: Page,
  frameSelector: string,
  buttonSelector: string,
): Promise<Locator | null> {
  const frameCount = await page.locator(frameSelector).count();
  const frames = page.frameLocator(frameSelector);
  for (let i = 0; i < frameCount; i += 1) {
    const button = frames.nth(i).locator(buttonSelector);
    if ((await button.count()) > 0) return button.first();
  }
  return null;
}

/**
 * Drives Chromium through the consent page. The browser lives in its own
 * process, so waiting here does not hold up other requests.
 */
export class PlaywrightConsentProvider implements ConsentProvider {
  private readonly headless: boolean;
  private readonly frameTitle: string;
  private readonly acceptButtonTitle: string;

  constructor(options: PlaywrightConsentOptions = {}) {
    this.headless = options.headless ?? true;
    this.frameTitle = options.frameTitle ?? CONSENT_FRAME_TITLE;
    this.acceptButtonTitle = options.acceptButtonTitle ?? ACCEPT_BUTTON_TITLE;
  }

  async acquireCookies(request: ConsentRequest): Promise<CookieJar> {
    request.signal?.throwIfAborted();

    const browser = await chromium.launch({ headless: this.headless });
    try {
      const context = await browser.newContext();
      const page = await context.newPage();
      await page.goto(request.consentUrl, { waitUntil: "domcontentloaded" });

      const frameSelector = `iframe[title="${this.frameTitle}"]`;
      const buttonSelector = `button[title="${this.acceptButtonTitle}"]`;

      const attempts = pollAttempts(request.timeoutSeconds);
      for (let attempt = 0; attempt < attempts; attempt += 1) {
        request.signal?.throwIfAborted();

        const acceptButton = await findAcceptButton(page, frameSelector, buttonSelector);
        if (acceptButton) {
          await acceptButton.click();
          const cookies = await context.cookies();
          log.debug({ attempt, cookieCount: cookies.length }, "Consent accepted");
          return Object.fromEntries(cookies.map((c) => [c.name, c.value]));
        }

        await page.waitForTimeout(POLL_INTERVAL_MS);
      }

      throw new ConsentTimeoutError(request.timeoutSeconds ?? 0);
    } finally {
      await closeBrowserSafely(browser);
    }
  }
}
