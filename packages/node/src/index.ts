/**
 * @cellar/node — HTTP service for the position registry and cellars.
 */

export { CellarService } from "./services/cellar-service.js";
export type {
  AvailableAdaptor,
  CellarServiceConfig,
  CellarSummary,
  CreateCellarInput,
  PositionBalanceView,
  ShareholderView,
} from "./services/cellar-service.js";
export {
  ProtocolsFileSchema,
  buildEnvironment,
  loadProtocolsFile,
  parseProtocolsFile,
} from "./services/environment.js";
export type { AdaptorRiskSettings, ProtocolsFile, SimulatedEnvironment } from "./services/environment.js";
export { ServiceError } from "./services/errors.js";
export type { ServiceErrorCode } from "./services/errors.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
