import { missingParameterError, type MissingParameterError } from '../core/errors.js';
import {
  MESSENGER_PROFILE_PATH,
  THREAD_SETTINGS_PATH,
  type GraphTransport,
} from '../core/graph-transport.js';
import { logger } from '../middleware/logger.js';
import {
  SETTINGS_START_PAYLOAD,
  buildAccountLinkingUrl,
  buildDomainWhitelist,
  buildDomainWhitelistRemoval,
  buildGreeting,
  buildHomeUrl,
  buildLegacyGreeting,
  buildPaymentSettings,
  buildPersistentMenu,
  buildStartButton,
  buildTargetAudience,
  type HomeUrlOptions,
  type PaymentSettingsInput,
} from './payloads.js';
import type { AudienceType, GreetingText, PersistentMenu, TargetCountries } from './types.js';

/** Messenger Profile API: page-level settings shown in the Messenger thread. */
export interface ProfileApi {
  /**
   * Set the greeting text (legacy thread settings endpoint) and a Get Started
   * button with the `USER_START` payload, one request after the other.
   */
  postSettings(greetingText: string): Promise<[greeting: Response, startButton: Response]>;

  /** Greetings per locale; a `default` locale entry is required. */
  postGreetingText(greetings: GreetingText[]): Promise<Response>;

  /** Get Started button postback payload, `START` when omitted. */
  postStartButton(payload?: string): Promise<Response>;

  postPersistentMenu(menus: PersistentMenu[]): Promise<Response>;

  /** Domains for Messenger Extensions and webviews (max 10, https only). */
  postDomainWhitelist(domains: string[]): Promise<Response>;

  deleteDomainWhitelist(): Promise<Response>;

  postAccountLinkingUrl(url: string): Promise<Response>;

  /**
   * At least one setting must be non-empty. When none is, no request is
   * made and a `MissingParameterError` comes back instead of a response.
   */
  postPaymentSettings(input: PaymentSettingsInput): Promise<Response | MissingParameterError>;

  /** `countries` is only sent for the `custom` and `none` audience types. */
  postTargetAudience(countries: TargetCountries | null, audienceType?: AudienceType): Promise<Response>;

  postChatExtensionHomeUrl(url: string, options?: HomeUrlOptions): Promise<Response>;
}

export function createProfileApi(transport: GraphTransport): ProfileApi {
  return {
    async postSettings(greetingText) {
      const greeting = await transport.post(THREAD_SETTINGS_PATH, buildLegacyGreeting(greetingText));
      const startButton = await transport.post(
        MESSENGER_PROFILE_PATH,
        buildStartButton(SETTINGS_START_PAYLOAD),
      );
      return [greeting, startButton];
    },

    postGreetingText(greetings) {
      return transport.post(MESSENGER_PROFILE_PATH, buildGreeting(greetings));
    },

    postStartButton(payload) {
      return transport.post(MESSENGER_PROFILE_PATH, buildStartButton(payload));
    },

    postPersistentMenu(menus) {
      return transport.post(MESSENGER_PROFILE_PATH, buildPersistentMenu(menus));
    },

    postDomainWhitelist(domains) {
      return transport.post(MESSENGER_PROFILE_PATH, buildDomainWhitelist(domains));
    },

    deleteDomainWhitelist() {
      return transport.delete(MESSENGER_PROFILE_PATH, buildDomainWhitelistRemoval());
    },

    postAccountLinkingUrl(url) {
      return transport.post(MESSENGER_PROFILE_PATH, buildAccountLinkingUrl(url));
    },

    async postPaymentSettings(input) {
      const payload = buildPaymentSettings(input);
      if (!payload) {
        logger.warn('Payment settings call skipped: no setting supplied');
        return missingParameterError();
      }
      return transport.post(MESSENGER_PROFILE_PATH, payload);
    },

    postTargetAudience(countries, audienceType) {
      return transport.post(MESSENGER_PROFILE_PATH, buildTargetAudience(countries, audienceType));
    },

    postChatExtensionHomeUrl(url, options) {
      return transport.post(MESSENGER_PROFILE_PATH, buildHomeUrl(url, options));
    },
  };
}
