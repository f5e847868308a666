export { CliError, exitCodeForStatus, isCliError, toCliError, type CliErrorDetail, type CliErrorKind } from "./errors.js";
export {
  apiBaseCandidates,
  canonicalHostKey,
  inferDefaultScheme,
  normalizeHostInput,
  tryCanonicalHostKey,
} from "./http/host.js";
export {
  BaseSelection,
  buildBaseCandidates,
  buildUrlForBase,
  isWrongBaseError,
  joinRelativeUrl,
  tryWithBaseFallback,
  type BaseCandidate,
} from "./http/multi-base.js";
export {
  executeWithRetry,
  parseRetryAfter,
  shouldRetryStatus,
  type FetchLike,
  type HttpMethod,
  type RetryPolicy,
  type SleepFn,
  type TransportRequest,
} from "./http/executor.js";
export { HttpClient, type RequestHeaders } from "./http/client.js";
export type { ClientOptions } from "./http/client-base.js";
export {
  TrpcClient,
  cookieFromEffective,
  parseTrpcEnvelope,
  requireCookieFromEffective,
  type TrpcClientOptions,
} from "./http/trpc-client.js";
export {
  DEFAULT_HOST,
  resolveEffectiveConfig,
  selectProfile,
  selectProfileForHost,
  type EffectiveConfig,
} from "./config/context.js";
export {
  JsonConfigStore,
  defaultConfigPath,
  emptyConfig,
  type ConfigRecord,
  type ConfigStore,
  type ProfileConfig,
} from "./config/store.js";
export { createProgram } from "./commands/index.js";
