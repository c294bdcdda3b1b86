import { ClientHandle, ClientHandleReference } from '~connectivity/client-handle';
import { Credential } from '~credentials/credential';
import { ConfigurationError } from '~provider-error';

describe('when creating a client handle', () => {
    const credential = new Credential('AKIDtest', 'test-secret');

    test('protocol defaults to HTTPS', () => {
        const handle = new ClientHandle(credential, 'ap-guangzhou');
        expect(handle.protocol).toBe('HTTPS');
        expect(handle.domain).toBe('');
    });

    test('handle cannot be modified', () => {
        const handle = new ClientHandle(credential, 'ap-guangzhou');
        expect(Object.isFrozen(handle)).toBe(true);
    });

    test('endpoint uses default root domain', () => {
        const handle = new ClientHandle(credential, 'ap-guangzhou');
        expect(handle.endpointFor('sts')).toBe('sts.tencentcloudapi.com');
    });

    test('endpoint uses configured domain', () => {
        const handle = new ClientHandle(credential, 'ap-guangzhou', 'HTTP', 'internal.example.com');
        expect(handle.endpointFor('cvm')).toBe('cvm.internal.example.com');
    });
});

describe('when replacing the credential of a handle', () => {
    const base = new ClientHandle(new Credential('AKIDbase', 'base-secret'), 'ap-shanghai', 'HTTP', 'example.com');
    const temporary = new Credential('AKIDtmp', 'tmp-secret', 'tmp-token');
    const replaced = base.withCredential(temporary);

    test('a new handle is returned', () => {
        expect(replaced).not.toBe(base);
        expect(base.credential.id).toBe('AKIDbase');
    });

    test('new handle carries only the new credential', () => {
        expect(replaced.credential).toBe(temporary);
    });

    test('other fields are kept', () => {
        expect(replaced.region).toBe('ap-shanghai');
        expect(replaced.protocol).toBe('HTTP');
        expect(replaced.domain).toBe('example.com');
    });
});

describe('when creating sdk client configuration', () => {

    test('configuration carries credential, region and http profile', () => {
        const handle = new ClientHandle(new Credential('AKIDtest', 'test-secret', 'test-token'), 'ap-guangzhou', 'HTTP');
        expect(handle.clientConfigFor('sts', 30)).toEqual({
            credential: { secretId: 'AKIDtest', secretKey: 'test-secret', token: 'test-token' },
            region: 'ap-guangzhou',
            profile: {
                httpProfile: {
                    protocol: 'http://',
                    endpoint: 'sts.tencentcloudapi.com',
                    reqMethod: 'POST',
                    reqTimeout: 30,
                },
            },
        });
    });

    test('https protocol and default timeout are used by default', () => {
        const handle = new ClientHandle(new Credential('AKIDtest', 'test-secret'), 'ap-guangzhou');
        const config = handle.clientConfigFor('cvm');
        expect(config.profile?.httpProfile?.protocol).toBe('https://');
        expect(config.profile?.httpProfile?.reqTimeout).toBe(300);
    });
});

describe('when holding a client handle reference', () => {

    test('reading before configuration fails', () => {
        const reference = new ClientHandleReference();
        expect(reference.isSet()).toBe(false);
        expect(() => reference.get()).toThrow(ConfigurationError);
    });

    test('replace swaps the whole handle', () => {
        const reference = new ClientHandleReference();
        const first = new ClientHandle(new Credential('AKIDone', 'secret-one'), 'ap-guangzhou');
        const second = first.withCredential(new Credential('AKIDtwo', 'secret-two', 'token-two'));
        reference.replace(first);
        reference.replace(second);
        expect(reference.get()).toBe(second);
    });
});
