import { ConfigurationError, ValidationError } from '~provider-error';
import { EnvironmentProvider, ProcessEnvironment } from '~util/environment';
import { OptionSchema, PROVIDER_SCHEMA, SchemaMap } from './provider-schema';

export type SettingValue = string | number | RawSettings | RawSettings[] | undefined;

export interface RawSettings {
    [name: string]: SettingValue;
}

/**
 * Typed read access to provider configuration. Absent optional values read as their zero
 * value (`''` or `0`); absent required values fail with a ConfigurationError.
 */
export interface ConfigurationSource {
    getString(key: string): string;
    getInt(key: string): number;
    getBlocks(key: string): ConfigurationSource[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Configuration source over explicitly provided settings. Each value resolves, in order of
 * precedence, from the settings, from the option's environment variable and from the option's default.
 */
export class SettingsConfigurationSource implements ConfigurationSource {

    constructor(private readonly settings: RawSettings,
                private readonly schema: SchemaMap = PROVIDER_SCHEMA,
                private readonly env: EnvironmentProvider = new ProcessEnvironment(),
                private readonly prefix = '') {
    }

    public getString(key: string): string {
        const option = this.option(key, 'string');
        const value = this.resolve(key, option);
        if (value === undefined) {
            return '';
        }
        const result = String(value);
        option.validate?.(result, this.path(key));
        return result;
    }

    public getInt(key: string): number {
        const option = this.option(key, 'int');
        const value = this.resolve(key, option);
        if (value === undefined) {
            return 0;
        }
        const result = SettingsConfigurationSource.ParseInt(value, this.path(key));
        option.validate?.(result, this.path(key));
        return result;
    }

    public getBlocks(key: string): ConfigurationSource[] {
        const option = this.option(key, 'block');
        const raw = this.settings[key];
        let blocks: RawSettings[];
        if (raw === undefined) {
            blocks = [];
        } else if (typeof raw === 'string' || typeof raw === 'number') {
            throw new ConfigurationError(`${this.path(key)} must be a block, got ${JSON.stringify(raw)}`);
        } else if (Array.isArray(raw)) {
            blocks = raw;
        } else {
            blocks = [raw];
        }

        if (option.maxItems !== undefined && blocks.length > option.maxItems) {
            throw new ValidationError(`${this.path(key)}: attribute supports ${option.maxItems} item maximum, config has ${blocks.length} declared`);
        }
        return blocks.map(block => new SettingsConfigurationSource(block, option.elem ?? {}, this.env, `${this.path(key)}.`));
    }

    /**
     * Reads every option declared by the schema, nested blocks included, so that
     * all validation errors surface without using the values.
     */
    public validate(): void {
        for (const [key, option] of Object.entries(this.schema)) {
            switch (option.type) {
                case 'string':
                    this.getString(key);
                    break;
                case 'int':
                    this.getInt(key);
                    break;
                case 'block':
                    for (const block of this.getBlocks(key)) {
                        if (block instanceof SettingsConfigurationSource) {
                            block.validate();
                        }
                    }
                    break;
            }
        }
    }

    public static ParseInt(value: string | number, path: string): number {
        if (typeof value === 'number') {
            if (!Number.isInteger(value)) {
                throw new ConfigurationError(`${path} must be an integer, got ${value}`);
            }
            return value;
        }
        const trimmed = value.trim();
        if (!INTEGER_PATTERN.test(trimmed)) {
            throw new ConfigurationError(`${path} must be an integer, got ${JSON.stringify(value)}`);
        }
        return parseInt(trimmed, 10);
    }

    private option(key: string, type: OptionSchema['type']): OptionSchema {
        const option = this.schema[key];
        if (option === undefined) {
            throw new ConfigurationError(`unknown configuration option ${this.path(key)}`);
        }
        if (option.type !== type) {
            throw new ConfigurationError(`configuration option ${this.path(key)} is of type ${option.type}, not ${type}`);
        }
        return option;
    }

    private resolve(key: string, option: OptionSchema): string | number | undefined {
        const explicit = this.settings[key];
        if (typeof explicit === 'object') {
            throw new ConfigurationError(`${this.path(key)} must be a single value`);
        }
        if (explicit !== undefined && explicit !== '') {
            return explicit;
        }
        if (option.envVar !== undefined) {
            const fromEnv = this.env.get(option.envVar);
            if (fromEnv !== undefined && fromEnv !== '') {
                return fromEnv;
            }
        }
        if (option.default !== undefined) {
            return option.default;
        }
        if (option.required) {
            const hint = option.envVar !== undefined ? ` (or set ${option.envVar})` : '';
            throw new ConfigurationError(`${this.path(key)} is required${hint}`);
        }
        return undefined;
    }

    private path(key: string): string {
        return this.prefix + key;
    }
}
