import { ValidationError } from '~provider-error';

export type ValueValidator = (value: string | number, key: string) => void;

export const validateAllowedStringValue = (allowed: string[]): ValueValidator => {
    return (value, key) => {
        if (typeof value !== 'string' || !allowed.includes(value)) {
            throw new ValidationError(`${key} value ${JSON.stringify(value)} is invalid, expected one of: ${allowed.join(', ')}`);
        }
    };
};

export const validateIntegerInRange = (min: number, max: number): ValueValidator => {
    return (value, key) => {
        if (typeof value !== 'number' || !Number.isInteger(value)) {
            throw new ValidationError(`${key} value ${JSON.stringify(value)} is not an integer`);
        }
        if (value < min) {
            throw new ValidationError(`${key} cannot be lower than ${min}: ${value}`);
        }
        if (value > max) {
            throw new ValidationError(`${key} cannot be higher than ${max}: ${value}`);
        }
    };
};

export class Validator {

    /**
     * Rejects attributes in the runtime configuration file that do not map onto a provider option.
     */
    static validateRC(rc: IRCObject | undefined, ...knownAttributes: string[]): void {
        if (rc === undefined) { return; }

        const clone: Record<string, unknown> = { ...rc };
        const configs = rc.configs ?? [];

        delete clone.configs;
        delete clone.config;
        delete clone._;

        Validator.ThrowForUnknownAttribute(clone, `runtime configuration file (${configs.join(', ')})`, ...knownAttributes);
    }

    static ThrowForUnknownAttribute(obj: object, id: string, ...knownAttributes: string[]): void {
        for (const att in obj) {
            if (!knownAttributes.includes(att)) {
                throw new ValidationError(`unexpected attribute ${att} found on ${id}. expected attributes are ${knownAttributes.join(', ')}`);
            }
        }
    }
}

export interface IRCObject {
    configs?: string[];
    config?: string;
    _?: string[];
    [key: string]: unknown;
}
