export { LLMClient } from "./client.js";
export {
    resolveLanguageModel,
    resolveProviderName,
    hasProviderApiKey,
    SUPPORTED_PROVIDERS,
    PROVIDER_API_KEY_VARIABLES,
} from "./resolve.js";
export type { SupportedProvider } from "./resolve.js";
export { classifyOracleError } from "./oracle.js";
export type { Oracle, OracleCallParams, OracleResponse, OracleFailureStatus } from "./oracle.js";
export { ReliableTransport, backoffDelay, isRetryable } from "./transport.js";
export type { Transport, TransportStats, ReliableTransportOptions } from "./transport.js";
