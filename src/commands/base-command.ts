import { Command } from 'commander';
import RC from 'rc';
import { RawSettings, SettingsConfigurationSource, SettingValue } from '~config/configuration-source';
import { ASSUME_ROLE_SCHEMA, PROVIDER_SCHEMA } from '~config/provider-schema';
import { IRCObject, Validator } from '~config/validator';
import { ConfigurationError, ExchangeError, isApiError, ProviderError } from '~provider-error';
import { ConsoleUtil } from '~util/console-util';

export const RC_NAME = 'tc-provider';

export abstract class BaseCliCommand<T extends ICommandArgs> {

    /**
     * Builds the provider settings from the command line, falling back to the runtime
     * configuration file. Options given on neither are left to their environment variable.
     */
    public static BuildSettings(command: ICommandArgs, rc: IRCObject = {}): RawSettings {
        const settings: RawSettings = {
            secret_id: command.secretId ?? scalar(rc.secret_id, 'secret_id'),
            secret_key: command.secretKey ?? scalar(rc.secret_key, 'secret_key'),
            security_token: command.securityToken ?? scalar(rc.security_token, 'security_token'),
            region: command.region ?? scalar(rc.region, 'region'),
            protocol: command.protocol ?? scalar(rc.protocol, 'protocol'),
            domain: command.domain ?? scalar(rc.domain, 'domain'),
        };

        const rcAssumeRole = block(rc.assume_role, 'assume_role');
        const hasAssumeRole = command.assumeRole === true
            || command.roleArn !== undefined
            || command.sessionName !== undefined
            || rcAssumeRole !== undefined;

        if (hasAssumeRole) {
            const fromRc = rcAssumeRole ?? {};
            Validator.ThrowForUnknownAttribute(fromRc, 'assume_role in runtime configuration', ...Object.keys(ASSUME_ROLE_SCHEMA));
            settings.assume_role = {
                role_arn: command.roleArn ?? scalar(fromRc.role_arn, 'assume_role.role_arn'),
                session_name: command.sessionName ?? scalar(fromRc.session_name, 'assume_role.session_name'),
                session_duration: command.sessionDuration ?? scalar(fromRc.session_duration, 'assume_role.session_duration') ?? 0,
                policy: command.policy ?? scalar(fromRc.policy, 'assume_role.policy'),
            };
        }
        return settings;
    }

    protected command?: Command;
    protected rc: IRCObject = {};

    constructor(command?: Command, name?: string, description?: string) {
        if (command !== undefined && name !== undefined) {
            this.command = command.command(name);
            if (description !== undefined) {
                this.command.description(description);
            }
            this.command.allowUnknownOption(false);
            this.addOptions(this.command);
            this.command.action(async (options: T) => {
                await this.invoke(options);
            });
        }
    }

    public async invoke(command: T): Promise<void> {
        try {
            this.initialize(command);
            await this.performCommand(command);
        } catch (err) {
            if (err instanceof ProviderError) {
                ConsoleUtil.LogError(err.message);
                if (err instanceof ExchangeError && (err.apiCode !== undefined || err.requestId !== undefined)) {
                    ConsoleUtil.LogError(`error: ${err.apiCode ?? 'unknown'}, request-id: ${err.requestId ?? 'unknown'}`);
                }
            } else if (isApiError(err)) {
                ConsoleUtil.LogError(`error: ${err.code ?? 'unknown'}, request-id: ${err.requestId ?? 'unknown'}`);
                ConsoleUtil.LogError(err.message);
            } else if (err instanceof Error) {
                ConsoleUtil.LogError('unexpected error occurred...', err);
            } else {
                ConsoleUtil.LogError(`unexpected error occurred... ${String(err)}`);
            }
            process.exitCode = 1;
        }
    }

    public abstract performCommand(command: T): Promise<void>;

    protected addOptions(command: Command): void {
        command.option('--secret-id <secret-id>', 'access key id, defaults to TENCENTCLOUD_SECRET_ID');
        command.option('--secret-key <secret-key>', 'secret key, defaults to TENCENTCLOUD_SECRET_KEY');
        command.option('--security-token <security-token>', 'session token of temporary credentials, defaults to TENCENTCLOUD_SECURITY_TOKEN');
        command.option('--region <region>', 'region, defaults to TENCENTCLOUD_REGION (e.g. ap-guangzhou)');
        command.option('--protocol <protocol>', 'protocol of API requests, HTTP or HTTPS (default HTTPS)');
        command.option('--domain <domain>', 'root domain of API requests (default tencentcloudapi.com)');
        command.option('--assume-role', 'assume a role, taking role arn and session name from the environment when not given');
        command.option('--role-arn <role-arn>', 'arn of the role to assume');
        command.option('--session-name <session-name>', 'session name used when assuming the role');
        command.option('--session-duration <seconds>', 'duration of the assumed role session, 0 defers to TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION then 7200');
        command.option('--policy <policy>', 'policy further restricting the assumed role session');
        command.option('--print-stack', 'will print stack traces for errors');
        command.option('--verbose', 'will enable debug logging');
        command.option('--no-color', 'will disable colorization of console logs');
    }

    protected createConfigurationSource(command: T): SettingsConfigurationSource {
        return new SettingsConfigurationSource(BaseCliCommand.BuildSettings(command, this.rc));
    }

    protected initialize(command: T): void {
        if (command.printStack === true) {
            ConsoleUtil.printStacktraces = true;
        }
        if (command.verbose === true) {
            ConsoleUtil.verbose = true;
        }
        if (command.color === false) {
            ConsoleUtil.colorizeLogs = false;
        }
        ConsoleUtil.RegisterSecret(command.secretKey);
        ConsoleUtil.RegisterSecret(command.securityToken);

        this.loadRuntimeConfiguration();
    }

    private loadRuntimeConfiguration(): void {
        const rc: IRCObject = RC(RC_NAME, {}, {});
        if (rc.configs === undefined) {
            return;
        }
        Validator.validateRC(rc, ...Object.keys(PROVIDER_SCHEMA));
        ConsoleUtil.RegisterSecret(typeof rc.secret_key === 'string' ? rc.secret_key : undefined);
        ConsoleUtil.RegisterSecret(typeof rc.security_token === 'string' ? rc.security_token : undefined);
        ConsoleUtil.LogDebug(`runtime configuration loaded from ${rc.configs.join(', ')}`);
        this.rc = rc;
    }
}

const scalar = (value: unknown, key: string): string | number | undefined => {
    if (value === undefined || typeof value === 'string' || typeof value === 'number') {
        return value;
    }
    throw new ConfigurationError(`${key} in runtime configuration must be a string or number`);
};

const block = (value: unknown, key: string): RawSettings | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new ConfigurationError(`${key} in runtime configuration must be a single block`);
    }
    const result: RawSettings = {};
    for (const [name, entry] of Object.entries(value)) {
        const setting: SettingValue = scalar(entry, `${key}.${name}`);
        result[name] = setting;
    }
    return result;
};

export interface ICommandArgs {
    secretId?: string;
    secretKey?: string;
    securityToken?: string;
    region?: string;
    protocol?: string;
    domain?: string;
    assumeRole?: boolean;
    roleArn?: string;
    sessionName?: string;
    sessionDuration?: string;
    policy?: string;
    printStack?: boolean;
    verbose?: boolean;
    color?: boolean;
}
