import { ConfigurationError } from '~provider-error';
import { SettingsConfigurationSource } from '~config/configuration-source';
import {
    DEFAULT_SESSION_DURATION,
    MAX_SESSION_DURATION,
    PROVIDER_ASSUME_ROLE_SESSION_DURATION,
} from '~config/provider-schema';
import { validateIntegerInRange } from '~config/validator';
import { EnvironmentProvider } from '~util/environment';

export const ASSUME_ROLE_ACTION = 'AssumeRole';

export interface AssumeRoleSpec {
    roleArn: string;
    sessionName: string;
    sessionDurationSeconds: number;
    policy?: string;
}

/**
 * A validated role-exchange request. `policy` is already query-escaped and is absent
 * (not empty) when no policy was configured.
 */
export interface AssumeRoleRequest {
    readonly action: typeof ASSUME_ROLE_ACTION;
    readonly roleArn: string;
    readonly roleSessionName: string;
    readonly durationSeconds: number;
    readonly policy?: string;
}

const validateSessionDuration = validateIntegerInRange(0, MAX_SESSION_DURATION);

export const buildAssumeRoleRequest = (spec: AssumeRoleSpec, env: EnvironmentProvider): AssumeRoleRequest => {
    if (spec.roleArn === '') {
        throw new ConfigurationError('assume_role.role_arn is required');
    }
    if (spec.sessionName === '') {
        throw new ConfigurationError('assume_role.session_name is required');
    }
    validateSessionDuration(spec.sessionDurationSeconds, 'assume_role.session_duration');

    const request: AssumeRoleRequest = {
        action: ASSUME_ROLE_ACTION,
        roleArn: spec.roleArn,
        roleSessionName: spec.sessionName,
        durationSeconds: resolveSessionDuration(spec.sessionDurationSeconds, env),
    };

    if (spec.policy !== undefined && spec.policy !== '') {
        return { ...request, policy: queryEscape(spec.policy) };
    }
    return request;
};

/**
 * A duration of 0 defers to the environment variable, then to the default of 7200 seconds.
 */
export const resolveSessionDuration = (configured: number, env: EnvironmentProvider): number => {
    if (configured !== 0) {
        return configured;
    }
    const fromEnv = env.get(PROVIDER_ASSUME_ROLE_SESSION_DURATION);
    if (fromEnv === undefined || fromEnv === '') {
        return DEFAULT_SESSION_DURATION;
    }
    const duration = SettingsConfigurationSource.ParseInt(fromEnv, PROVIDER_ASSUME_ROLE_SESSION_DURATION);
    if (duration === 0) {
        return DEFAULT_SESSION_DURATION;
    }
    validateSessionDuration(duration, PROVIDER_ASSUME_ROLE_SESSION_DURATION);
    return duration;
};

/**
 * Escapes a value for use in a query string: spaces become `+`, everything outside
 * `A-Z a-z 0-9 - _ . ~` is percent-encoded.
 */
export const queryEscape = (value: string): string => {
    return encodeURIComponent(value)
        .replace(/[!'()*]/g, c => '%' + c.charCodeAt(0).toString(16).toUpperCase())
        .replace(/%20/g, '+');
};
