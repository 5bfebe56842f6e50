export { Session, createSession } from './api/session';
export { PageIterator } from './api/pageIterator';
export {
  WebexAdminError,
  RetriesExhaustedError,
  ConfigurationError,
  ValidationError,
} from './api/errors';
export {
  RESOURCES,
  DEFAULT_BASE_URL,
  DEFAULT_IDENTITY_URL,
  resourcePath,
  findResourcePath,
} from './api/resources';
export type { ResourceName } from './api/resources';
export { parseLinkHeader, parseRetryAfter, DEFAULT_RETRY_AFTER_SECONDS } from './api/headers';
export type {
  HttpMethod,
  RequestOptions,
  RequestOutcome,
  SessionConfig,
  ProxyCredentials,
  ProxyCredentialsProvider,
} from './api/types';
export { DirectoryClient, createDirectoryClient, buildPatchDocument, assertPatchDocument } from './directory/client';
export { DirectoryRecord } from './directory/record';
export { UserIterator } from './directory/userIterator';
export { PATCH_OP_SCHEMA } from './directory/types';
export type { PatchDocument, PatchOperation, ScimEmail, ScimRole, ScimUserResource } from './directory/types';
export { promptToken, orgIdFromToken } from './auth/token';
export { askQuestion, askSecret, createPrompt, promptProxyCredentials } from './auth/prompt';
export type { Ask, PromptOptions } from './auth/prompt';
export { disableUsers } from './workflows/disableUsers';
export type { DisableOutcome, DisableStatus } from './workflows/disableUsers';
export { buildRecordingReport } from './workflows/recordingReport';
export type { RecordingAccessRow } from './workflows/recordingReport';
export { generateTimeRanges } from './workflows/timeRanges';
