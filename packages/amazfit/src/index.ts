export { HuamiClient, withClient, type HuamiClientOptions } from "./providers/huami.ts";
export { mergeSummary, type SummarySources } from "./merge.ts";
export { ACTIVITY_MODES, WORKOUT_TYPES } from "./providers/normalize.ts";
export {
  ConfigurationError,
  InvalidArgumentError,
  AuthenticationError,
  TransportError,
  ParseError,
} from "@wristlog/shared";
export type * from "./types.ts";
