/**
 * Credential module for clickup-cli
 */

export { ApiKeyStorage, CredentialStoreError } from './apikey-storage.js';
export {
  MissingCredentialsError,
  resolveApiKey,
  resolveTeamId,
  resolveWorkspaceId,
  type ApiKeySource,
  type ResolveOptions,
  type ResolvedApiKey,
} from './credentials.js';
