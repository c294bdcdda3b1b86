import * as tencentcloud from 'tencentcloud-sdk-nodejs';
import { DEFAULT_DOMAIN } from '~config/provider-schema';
import { Credential } from '~credentials/credential';
import { ConfigurationError } from '~provider-error';

export type Protocol = 'HTTP' | 'HTTPS';

/**
 * Configuration accepted by the constructor of every TencentCloud SDK service client.
 */
export type SdkClientConfig = ConstructorParameters<typeof tencentcloud.sts.v20180813.Client>[0];

/** seconds */
export const DEFAULT_REQUEST_TIMEOUT = 300;

/**
 * The configured API client shared by all resource and data source handlers of a run.
 * A handle never changes: replacing the credential yields a new handle.
 */
export class ClientHandle {

    constructor(public readonly credential: Credential,
                public readonly region: string,
                public readonly protocol: Protocol = 'HTTPS',
                public readonly domain = '') {
        Object.freeze(this);
    }

    public withCredential(credential: Credential): ClientHandle {
        return new ClientHandle(credential, this.region, this.protocol, this.domain);
    }

    public rootDomain(): string {
        return this.domain !== '' ? this.domain : DEFAULT_DOMAIN;
    }

    public endpointFor(service: string): string {
        return `${service}.${this.rootDomain()}`;
    }

    /**
     * Client configuration for the SDK client of `service`, e.g.
     * `new tencentcloud.cvm.v20170312.Client(handle.clientConfigFor('cvm'))`.
     */
    public clientConfigFor(service: string, reqTimeout = DEFAULT_REQUEST_TIMEOUT): SdkClientConfig {
        return {
            credential: {
                secretId: this.credential.id,
                secretKey: this.credential.secret,
                token: this.credential.sessionToken,
            },
            region: this.region,
            profile: {
                httpProfile: {
                    protocol: this.protocol === 'HTTP' ? 'http://' : 'https://',
                    endpoint: this.endpointFor(service),
                    reqMethod: 'POST',
                    reqTimeout,
                },
            },
        };
    }

    public equals(other: ClientHandle): boolean {
        return this.credential.equals(other.credential)
            && this.region === other.region
            && this.protocol === other.protocol
            && this.domain === other.domain;
    }
}

/**
 * Holds the current handle of a run. Readers always observe a complete handle: a refreshed
 * credential is installed by swapping in a whole new handle.
 */
export class ClientHandleReference {
    private current: ClientHandle | undefined;

    public isSet(): boolean {
        return this.current !== undefined;
    }

    public get(): ClientHandle {
        if (this.current === undefined) {
            throw new ConfigurationError('provider has not been configured');
        }
        return this.current;
    }

    public replace(handle: ClientHandle): void {
        this.current = handle;
    }
}
