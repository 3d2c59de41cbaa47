export { createMessengerClient } from './messenger/client.js';
export type { MessengerClient, MessengerClientOptions } from './messenger/client.js';
export type { ProfileApi } from './messenger/profile-api.js';
export type { SendApi, AttachmentOptions } from './messenger/send-api.js';
export { isUserProfile } from './messenger/user-profile.js';
export type { DecodedBody, UserProfile, UserProfileApi } from './messenger/user-profile.js';
export * from './messenger/payloads.js';
export type * from './messenger/types.js';

export {
  CREDENTIAL_ERROR_MESSAGE,
  ConfigurationError,
  isMissingParameterError,
  type MissingParameterError,
} from './core/errors.js';
export {
  createCredentialResolver,
  type CredentialResolver,
  type SettingsProvider,
} from './core/credentials.js';
export {
  MESSAGES_PATH,
  MESSAGE_ATTACHMENTS_PATH,
  MESSENGER_PROFILE_PATH,
  THREAD_SETTINGS_PATH,
  createGraphTransport,
  type FetchLike,
  type GraphTransport,
} from './core/graph-transport.js';
export { loadMessengerConfig, type MessengerConfig, type LoadConfigOptions } from './utils/config.js';
export { logger } from './middleware/logger.js';
