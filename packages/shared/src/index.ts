export { HttpClient, type HttpOptions, type RequestOptions } from "./http.ts";
export {
  WristlogError,
  ConfigurationError,
  InvalidArgumentError,
  AuthenticationError,
  TransportError,
  ParseError,
  type ErrorContext,
} from "./errors.ts";
export { getConfigDir, getModuleConfigPath, readConfig, writeConfig } from "./config.ts";
export { error } from "./output.ts";
