import { buildAssumeRoleRequest, queryEscape, resolveSessionDuration } from '~credentials/assume-role-request-builder';
import { ConfigurationError, ValidationError } from '~provider-error';
import { StaticEnvironment } from '~util/environment';

const roleArn = 'qcs::cam::uin/100000000001:roleName/test-role';

describe('when building an assume role request', () => {
    const env = new StaticEnvironment();

    test('fields are copied onto the request', () => {
        const request = buildAssumeRoleRequest({ roleArn, sessionName: 'test-session', sessionDurationSeconds: 3600 }, env);
        expect(request).toEqual({
            action: 'AssumeRole',
            roleArn,
            roleSessionName: 'test-session',
            durationSeconds: 3600,
        });
    });

    test('empty policy is left out of the request', () => {
        const request = buildAssumeRoleRequest({ roleArn, sessionName: 'test-session', sessionDurationSeconds: 3600, policy: '' }, env);
        expect('policy' in request).toBe(false);
    });

    test('policy is query escaped', () => {
        const request = buildAssumeRoleRequest({ roleArn, sessionName: 'test-session', sessionDurationSeconds: 3600, policy: 'a b' }, env);
        expect(request.policy).toBe('a+b');
    });

    test('missing role arn fails', () => {
        expect(() => buildAssumeRoleRequest({ roleArn: '', sessionName: 'test-session', sessionDurationSeconds: 3600 }, env))
            .toThrow(ConfigurationError);
    });

    test('missing session name fails', () => {
        expect(() => buildAssumeRoleRequest({ roleArn, sessionName: '', sessionDurationSeconds: 3600 }, env))
            .toThrow('assume_role.session_name is required');
    });

    test('duration out of range fails', () => {
        expect(() => buildAssumeRoleRequest({ roleArn, sessionName: 'test-session', sessionDurationSeconds: 43201 }, env))
            .toThrow(ValidationError);
    });
});

describe('when resolving the session duration', () => {

    test('non zero duration is used as is', () => {
        const env = new StaticEnvironment({ TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION: '3600' });
        expect(resolveSessionDuration(1800, env)).toBe(1800);
    });

    test('zero without environment override resolves to 7200', () => {
        expect(resolveSessionDuration(0, new StaticEnvironment())).toBe(7200);
    });

    test('zero with environment override resolves to override', () => {
        const env = new StaticEnvironment({ TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION: '3600' });
        expect(resolveSessionDuration(0, env)).toBe(3600);
    });

    test('zero with environment override of zero resolves to 7200', () => {
        const env = new StaticEnvironment({ TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION: '0' });
        expect(resolveSessionDuration(0, env)).toBe(7200);
    });

    test('zero with non numeric environment override fails', () => {
        const env = new StaticEnvironment({ TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION: 'abc' });
        expect(() => resolveSessionDuration(0, env)).toThrow(ConfigurationError);
    });

    test('zero with environment override out of range fails', () => {
        const env = new StaticEnvironment({ TENCENTCLOUD_ASSUME_ROLE_SESSION_DURATION: '50000' });
        expect(() => resolveSessionDuration(0, env)).toThrow(ValidationError);
    });
});

describe('when query escaping a value', () => {

    test('unreserved characters are kept', () => {
        expect(queryEscape('abc-_.~123')).toBe('abc-_.~123');
    });

    test('reserved characters are percent encoded', () => {
        expect(queryEscape('{"effect":"allow"}')).toBe('%7B%22effect%22%3A%22allow%22%7D');
    });

    test('sub-delimiters are percent encoded', () => {
        expect(queryEscape("!'()*")).toBe('%21%27%28%29%2A');
    });
});
