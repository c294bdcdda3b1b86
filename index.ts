export { Credential } from './src/credentials/credential';
export {
    ASSUME_ROLE_ACTION,
    AssumeRoleRequest,
    AssumeRoleSpec,
    buildAssumeRoleRequest,
    queryEscape,
    resolveSessionDuration,
} from './src/credentials/assume-role-request-builder';
export { ClientHandle, ClientHandleReference, Protocol, SdkClientConfig } from './src/connectivity/client-handle';
export { ConfigurationSource, RawSettings, SettingsConfigurationSource } from './src/config/configuration-source';
export * from './src/config/provider-schema';
export { EnvironmentProvider, ProcessEnvironment, StaticEnvironment } from './src/util/environment';
export { PQueueRateLimiter, RateLimiter, RateLimiterOptions } from './src/ratelimit/rate-limiter';
export { exchangeCredential, ExchangeOptions } from './src/sts/exchange';
export { StsApi, StsTokenExchangeClient, TokenExchangeClient } from './src/sts/token-exchange-client';
export {
    configureProvider,
    ConfigurationState,
    ConfigureDependencies,
    ProviderConfig,
    readProviderConfig,
} from './src/provider/provider-configurer';
export { Provider } from './src/provider/provider';
export { ConfigurationError, ErrorCode, ExchangeError, ProviderError, ValidationError } from './src/provider-error';
