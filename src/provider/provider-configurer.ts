import { ConfigurationSource } from '~config/configuration-source';
import { ClientHandle, DEFAULT_REQUEST_TIMEOUT, Protocol } from '~connectivity/client-handle';
import { AssumeRoleSpec, buildAssumeRoleRequest } from '~credentials/assume-role-request-builder';
import { Credential } from '~credentials/credential';
import { ConfigurationError, ValidationError } from '~provider-error';
import { PQueueRateLimiter, RateLimiter } from '~ratelimit/rate-limiter';
import { exchangeCredential } from '~sts/exchange';
import { StsTokenExchangeClient, TokenExchangeClient } from '~sts/token-exchange-client';
import { ConsoleUtil } from '~util/console-util';
import { EnvironmentProvider, ProcessEnvironment } from '~util/environment';

export type ConfigurationState =
    | 'Unconfigured'
    | 'BaseCredentialLoaded'
    | 'AssumeRoleRequested'
    | 'AssumeRoleGranted'
    | 'Ready'
    | 'Failed';

export interface ProviderConfig {
    readonly credential: Credential;
    readonly region: string;
    readonly protocol: Protocol;
    readonly domain: string;
    readonly assumeRole?: AssumeRoleSpec;
}

export interface ConfigureDependencies {
    /** environment consulted for the session duration fallback */
    env?: EnvironmentProvider;
    rateLimiter?: RateLimiter;
    exchangeClientFactory?: (base: ClientHandle) => TokenExchangeClient;
    signal?: AbortSignal;
    /** milliseconds allowed for the role exchange */
    timeoutMs?: number;
    onStateChange?: (state: ConfigurationState) => void;
}

/**
 * Reads and validates the provider configuration. Protocol, region, domain and the
 * assume_role block are checked before any credential is read. No network activity.
 */
export const readProviderConfig = (source: ConfigurationSource): ProviderConfig => {
    const protocol = toProtocol(source.getString('protocol'));
    const region = source.getString('region');
    if (region === '') {
        throw new ConfigurationError('region is required');
    }
    const domain = source.getString('domain');
    const assumeRole = readAssumeRole(source);

    const secretKey = source.getString('secret_key');
    const securityToken = source.getString('security_token');
    ConsoleUtil.RegisterSecret(secretKey);
    ConsoleUtil.RegisterSecret(securityToken);

    const credential = new Credential(source.getString('secret_id'), secretKey, securityToken);
    if (!credential.isUsable()) {
        throw new ConfigurationError('secret_id and secret_key are required');
    }

    const config: ProviderConfig = { credential, region, protocol, domain };
    return assumeRole !== undefined ? { ...config, assumeRole } : config;
};

/**
 * Turns the provider configuration into the client handle used for the rest of the run.
 * With an assume_role block the configured credential is exchanged for a temporary one,
 * and only the temporary credential ends up in the returned handle.
 */
export const configureProvider = async (source: ConfigurationSource, dependencies: ConfigureDependencies = {}): Promise<ClientHandle> => {
    const run = new ConfigurationRun(dependencies.onStateChange);
    try {
        const config = readProviderConfig(source);
        const base = new ClientHandle(config.credential, config.region, config.protocol, config.domain);
        run.transition('BaseCredentialLoaded');

        if (config.assumeRole === undefined) {
            run.transition('Ready');
            return base;
        }

        const request = buildAssumeRoleRequest(config.assumeRole, dependencies.env ?? new ProcessEnvironment());
        run.transition('AssumeRoleRequested');

        const reqTimeout = requestTimeoutSeconds(dependencies.timeoutMs);
        const createClient = dependencies.exchangeClientFactory ?? ((handle: ClientHandle): TokenExchangeClient => StsTokenExchangeClient.FromClientHandle(handle, reqTimeout));
        const temporary = await exchangeCredential(request, {
            client: createClient(base),
            rateLimiter: dependencies.rateLimiter ?? PQueueRateLimiter.Shared(),
            signal: dependencies.signal,
            timeoutMs: dependencies.timeoutMs,
        });
        run.transition('AssumeRoleGranted');
        ConsoleUtil.UnregisterSecret(config.credential.secret);
        ConsoleUtil.UnregisterSecret(config.credential.sessionToken);

        const handle = base.withCredential(temporary);
        run.transition('Ready');
        return handle;
    } catch (err) {
        run.transition('Failed');
        throw err;
    }
};

class ConfigurationRun {
    private state: ConfigurationState = 'Unconfigured';

    constructor(private readonly onStateChange?: (state: ConfigurationState) => void) {
    }

    public transition(next: ConfigurationState): void {
        ConsoleUtil.LogDebug(`provider configuration: ${this.state} -> ${next}`);
        this.state = next;
        this.onStateChange?.(next);
    }
}

/**
 * SDK request timeout in seconds, never longer than the exchange timeout.
 */
const requestTimeoutSeconds = (timeoutMs: number | undefined): number => {
    if (timeoutMs === undefined) {
        return DEFAULT_REQUEST_TIMEOUT;
    }
    return Math.max(1, Math.ceil(timeoutMs / 1000));
};

const toProtocol = (value: string): Protocol => {
    if (value === 'HTTP' || value === 'HTTPS') {
        return value;
    }
    throw new ValidationError(`protocol value ${JSON.stringify(value)} is invalid, expected one of: HTTP, HTTPS`);
};

const readAssumeRole = (source: ConfigurationSource): AssumeRoleSpec | undefined => {
    const blocks = source.getBlocks('assume_role');
    if (blocks.length > 1) {
        throw new ValidationError(`assume_role: attribute supports 1 item maximum, config has ${blocks.length} declared`);
    }
    if (blocks.length !== 1) {
        return undefined;
    }

    const block = blocks[0];
    const spec: AssumeRoleSpec = {
        roleArn: block.getString('role_arn'),
        sessionName: block.getString('session_name'),
        sessionDurationSeconds: block.getInt('session_duration'),
    };
    const policy = block.getString('policy');
    return policy !== '' ? { ...spec, policy } : spec;
};
