import { validateAllowedStringValue, validateIntegerInRange, Validator } from '~config/validator';
import { ValidationError } from '~provider-error';

describe('when validating allowed string values', () => {
    const validate = validateAllowedStringValue(['HTTP', 'HTTPS']);

    test('allowed value passes', () => {
        expect(() => validate('HTTP', 'protocol')).not.toThrow();
    });

    test('values are case sensitive', () => {
        expect(() => validate('https', 'protocol')).toThrow(ValidationError);
    });

    test('error names key, value and allowed values', () => {
        expect(() => validate('FTP', 'protocol')).toThrow('protocol value "FTP" is invalid, expected one of: HTTP, HTTPS');
    });
});

describe('when validating integer ranges', () => {
    const validate = validateIntegerInRange(0, 43200);

    test('bounds are inclusive', () => {
        expect(() => validate(0, 'duration')).not.toThrow();
        expect(() => validate(43200, 'duration')).not.toThrow();
    });

    test('value above range fails', () => {
        expect(() => validate(43201, 'duration')).toThrow('duration cannot be higher than 43200: 43201');
    });

    test('string value fails', () => {
        expect(() => validate('10', 'duration')).toThrow(ValidationError);
    });
});

describe('when validating runtime configuration', () => {

    test('known attributes pass', () => {
        const rc = { configs: ['/home/test/.tc-providerrc'], config: '/home/test/.tc-providerrc', region: 'ap-guangzhou' };
        expect(() => Validator.validateRC(rc, 'region', 'secret_id')).not.toThrow();
    });

    test('unknown attribute fails', () => {
        const rc = { configs: ['/home/test/.tc-providerrc'], profile: 'default' };
        expect(() => Validator.validateRC(rc, 'region')).toThrow('unexpected attribute profile found on runtime configuration file (/home/test/.tc-providerrc). expected attributes are region');
    });

    test('undefined runtime configuration passes', () => {
        expect(() => Validator.validateRC(undefined, 'region')).not.toThrow();
    });
});
