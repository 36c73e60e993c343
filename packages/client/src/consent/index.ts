export {
  ACCEPT_BUTTON_TITLE,
  CONSENT_FRAME_TITLE,
  PlaywrightConsentProvider,
  pollAttempts,
  type PlaywrightConsentOptions,
} from "./playwright";
export type { ConsentProvider, ConsentRequest } from "./types";
