export { Launchpad, type LaunchpadOptions } from "./launchpad.js";
export { createAuthContext, plaintextAuthorization } from "./auth.js";
export type { AuthContext, Credentials } from "./auth.js";
export { RequestGateway } from "./gateway.js";
export type { CallOptions, FetchLike, RequestGatewayOptions, RequestParams } from "./gateway.js";
export { BoardResolver, livefsPath, projectFor, type ResolverOptions } from "./resolver.js";
export {
  buildCatalog,
  catalogKey,
  parseCatalog,
  DEFAULT_CATALOG,
  DEFAULT_CODENAMES,
} from "./catalog.js";
export type { BoardCatalog, CodenameTable } from "./catalog.js";
export { WebhookManager } from "./webhooks.js";
export { ImageBuilder, type ImageBuilderOptions } from "./images.js";
export type { SymmetricEncryptor } from "./encryption.js";
export { SnapManager, snapIdentityHash, type SnapManagerOptions } from "./snaps.js";
export { StatusAggregator, type StatusAggregatorOptions } from "./status.js";
export {
  LaunchpadError,
  NotFoundError,
  RemoteRequestError,
  UnknownBoardSystemCombinationError,
  UnknownCodenameError,
  UnrecognizedSystemLabelError,
} from "./errors.js";
