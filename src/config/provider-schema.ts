import { validateAllowedStringValue, validateIntegerInRange, ValueValidator } from './validator';

export const PROVIDER_SECRET_ID = 'TENCENTCLOUD_SECRET_ID';
export const PROVIDER_SECRET_KEY = 'TENCENTCLOUD_SECRET_KEY';
export const PROVIDER_SECURITY_TOKEN = 'TENCENTCLOUD_SECURITY_TOKEN';
export const PROVIDER_REGION = 'TENCENTCLOUD_REGION';
export const PROVIDER_PROTOCOL = 'TENCENTCLOUD_PROTOCOL';
export const PROVIDER_DOMAIN = 'TENCENTCLOUD_DOMAIN';
export const PROVIDER_ASSUME_ROLE_ARN = 'TENCENTCLOUD_ASSUME_ROLE_ARN';
export const PROVIDER_ASSUME_ROLE_SESSION_NAME = 'TENCENTCLOUD_ASSUME_ROLE_SESSION_NAME';
export const PROVIDER_ASSUME_ROLE_SESSION_DURATION = 'TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION';

export const DEFAULT_PROTOCOL = 'HTTPS';
export const DEFAULT_DOMAIN = 'tencentcloudapi.com';
export const DEFAULT_SESSION_DURATION = 7200;
export const MAX_SESSION_DURATION = 43200;

export type OptionType = 'string' | 'int' | 'block';

export interface OptionSchema {
    type: OptionType;
    description: string;
    required?: boolean;
    envVar?: string;
    default?: string | number;
    /** suggested to the user when prompting for a value, never filled in automatically */
    inputDefault?: string;
    sensitive?: boolean;
    maxItems?: number;
    validate?: ValueValidator;
    elem?: SchemaMap;
}

export type SchemaMap = Record<string, OptionSchema>;

export const ASSUME_ROLE_SCHEMA: SchemaMap = {
    role_arn: {
        type: 'string',
        required: true,
        envVar: PROVIDER_ASSUME_ROLE_ARN,
        description: `The ARN of the role to assume. It can be sourced from the \`${PROVIDER_ASSUME_ROLE_ARN}\`.`,
    },
    session_name: {
        type: 'string',
        required: true,
        envVar: PROVIDER_ASSUME_ROLE_SESSION_NAME,
        description: `The session name to use when making the AssumeRole call. It can be sourced from the \`${PROVIDER_ASSUME_ROLE_SESSION_NAME}\`.`,
    },
    session_duration: {
        type: 'int',
        required: true,
        inputDefault: String(DEFAULT_SESSION_DURATION),
        validate: validateIntegerInRange(0, MAX_SESSION_DURATION),
        description: `The duration of the session when making the AssumeRole call. Its value ranges from 0 to ${MAX_SESSION_DURATION}(seconds), and default is ${DEFAULT_SESSION_DURATION} seconds. It can be sourced from the \`${PROVIDER_ASSUME_ROLE_SESSION_DURATION}\`.`,
    },
    policy: {
        type: 'string',
        description: 'A more restrictive policy when making the AssumeRole call. Its content must not contain `principal` elements.',
    },
};

export const PROVIDER_SCHEMA: SchemaMap = {
    secret_id: {
        type: 'string',
        required: true,
        envVar: PROVIDER_SECRET_ID,
        description: `This is the TencentCloud access key. It must be provided, but it can also be sourced from the \`${PROVIDER_SECRET_ID}\` environment variable.`,
    },
    secret_key: {
        type: 'string',
        required: true,
        sensitive: true,
        envVar: PROVIDER_SECRET_KEY,
        description: `This is the TencentCloud secret key. It must be provided, but it can also be sourced from the \`${PROVIDER_SECRET_KEY}\` environment variable.`,
    },
    security_token: {
        type: 'string',
        sensitive: true,
        envVar: PROVIDER_SECURITY_TOKEN,
        description: `TencentCloud Security Token of temporary access credentials. It can be sourced from the \`${PROVIDER_SECURITY_TOKEN}\` environment variable.`,
    },
    region: {
        type: 'string',
        required: true,
        envVar: PROVIDER_REGION,
        inputDefault: 'ap-guangzhou',
        description: `This is the TencentCloud region. It must be provided, but it can also be sourced from the \`${PROVIDER_REGION}\` environment variables. The default input value is ap-guangzhou.`,
    },
    protocol: {
        type: 'string',
        envVar: PROVIDER_PROTOCOL,
        default: DEFAULT_PROTOCOL,
        validate: validateAllowedStringValue(['HTTP', 'HTTPS']),
        description: 'The protocol of the API request. Valid values: `HTTP` and `HTTPS`. Default is `HTTPS`.',
    },
    domain: {
        type: 'string',
        envVar: PROVIDER_DOMAIN,
        description: `The root domain of the API request, Default is \`${DEFAULT_DOMAIN}\`.`,
    },
    assume_role: {
        type: 'block',
        maxItems: 1,
        elem: ASSUME_ROLE_SCHEMA,
        description: 'The `assume_role` block. If provided, the provider will attempt to assume this role using the supplied credentials.',
    },
};
