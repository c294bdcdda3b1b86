import * as tencentcloud from 'tencentcloud-sdk-nodejs';
import { ClientHandle, DEFAULT_REQUEST_TIMEOUT } from '~connectivity/client-handle';
import { AssumeRoleRequest } from '~credentials/assume-role-request-builder';
import { Credential } from '~credentials/credential';
import { ExchangeError } from '~provider-error';

/**
 * Exchanges a role-assumption request for temporary credentials.
 */
export interface TokenExchangeClient {
    exchange(request: AssumeRoleRequest): Promise<Credential>;
}

export interface StsAssumeRoleInput {
    RoleArn: string;
    RoleSessionName: string;
    DurationSeconds?: number;
    Policy?: string;
}

export interface StsAssumeRoleOutput {
    Credentials?: {
        TmpSecretId?: string;
        TmpSecretKey?: string;
        Token?: string;
    };
    ExpiredTime?: number;
    Expiration?: string;
    RequestId?: string;
}

/**
 * The part of the SDK's STS client used here.
 */
export interface StsApi {
    AssumeRole(request: StsAssumeRoleInput): Promise<StsAssumeRoleOutput>;
}

export class StsTokenExchangeClient implements TokenExchangeClient {

    /**
     * Creates an exchange client calling the STS endpoint of the handle's domain with the
     * handle's (long-lived) credential.
     */
    public static FromClientHandle(handle: ClientHandle, reqTimeout = DEFAULT_REQUEST_TIMEOUT): StsTokenExchangeClient {
        const client = new tencentcloud.sts.v20180813.Client(handle.clientConfigFor('sts', reqTimeout));
        return new StsTokenExchangeClient(client);
    }

    constructor(private readonly api: StsApi) {
    }

    public async exchange(request: AssumeRoleRequest): Promise<Credential> {
        const input: StsAssumeRoleInput = {
            RoleArn: request.roleArn,
            RoleSessionName: request.roleSessionName,
            DurationSeconds: request.durationSeconds,
        };
        if (request.policy !== undefined) {
            input.Policy = request.policy;
        }

        const response = await this.api.AssumeRole(input);
        const credentials = response.Credentials;
        if (credentials === undefined || !credentials.TmpSecretId || !credentials.TmpSecretKey || !credentials.Token) {
            throw new ExchangeError(`AssumeRole response for ${request.roleArn} did not contain temporary credentials (request id: ${response.RequestId ?? 'unknown'})`);
        }
        return new Credential(credentials.TmpSecretId, credentials.TmpSecretKey, credentials.Token);
    }
}
