// Main client
export { Connection } from './client/connection.ts'
export type {
  TConnectionOptions,
  TLoginOptions,
  TUploadReleaseOptions,
  TUploadReleaseResult,
} from './client/connection.ts'

// Configuration
export {
  DEFAULT_API_ROOT,
  DEFAULT_CONFIG_PATH,
  ENV,
  ConfigFileSchema,
  loadSessionConfig,
  saveSessionConfig,
  readConfigFile,
  writeConfigFile,
} from './core/config.ts'
export type {
  TConfigFile,
  TConfigInput,
  TSessionConfig,
  TLoadSessionConfigOptions,
} from './core/config.ts'

// Routes and transport (for advanced usage)
export { ROUTES, resolveRoute, isRouteName } from './providers/endpoint/routes.ts'
export type {
  TRoute,
  TRouteName,
  TRouteParams,
  TRouteContext,
  TResolvedRoute,
} from './providers/endpoint/routes.ts'
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'
export { DEFAULT_RETRY_POLICY } from './core/retry.ts'

// Providers - Authentication
export { BearerAuthProvider } from './providers/auth/bearer-auth.ts'
export { SignedRequestAuthProvider } from './providers/auth/signed-request-auth.ts'
export type { TSignedRequestAuthOptions } from './providers/auth/signed-request-auth.ts'
export { createAuthProvider } from './providers/auth/auth-provider.ts'
export { resolveCredentials } from './providers/auth/credentials.ts'
export type {
  TCredentialInput,
  TCredentialOrigin,
  TResolvedCredential,
} from './providers/auth/credentials.ts'

// Instruction summaries
export { translate, translateProtocol, describe } from './domains/english/english.ts'
export { parseInstructions, InstructionSchema, SUPPORTED_OPS } from './domains/english/instructions.ts'
export type { TInstruction, TInstructionOp } from './domains/english/instructions.ts'

// Errors
export {
  ConfigurationError,
  NotFoundError,
  AbortOperationError,
  AmbiguousProjectError,
  AnalysisError,
  AuthError,
  MissingCredentialError,
  InvalidCredentialError,
  RouteError,
  UnknownRouteError,
  MissingParamError,
  TransportError,
  ConnectionFailedError,
  TimeoutError,
  HTTPError,
  ResponseFormatError,
  RedirectLimitError,
  TranslationError,
  UnsupportedInstructionError,
  InvalidInstructionError,
} from './core/errors.ts'

// Types
export type {
  THttpMethod,
  TRetryPolicy,
  TTransportRequest,
  TTransportResponse,
  TCallOptions,
  TAuthProvider,
  TAuthScheme,
  TCredential,
  TSignableRequest,
} from './core/types.ts'

export type {
  TAnalysis,
  TJsonObject,
  TKitResults,
  TLaunchRequest,
  TOrganization,
  TPackage,
  TPaymentMethod,
  TProject,
  TProtocol,
  TProtocolDocument,
  TQuickLaunch,
  TRelease,
  TReleaseStatus,
  TResourceResults,
  TRun,
  TRunDocument,
  TSearchResults,
  TSubmittedRun,
  TUploadedDataset,
} from './types/api.ts'
