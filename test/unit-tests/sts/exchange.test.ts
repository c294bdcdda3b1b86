import Sinon from 'sinon';
import { AssumeRoleRequest } from '~credentials/assume-role-request-builder';
import { Credential } from '~credentials/credential';
import { ExchangeError } from '~provider-error';
import { RateLimiter } from '~ratelimit/rate-limiter';
import { exchangeCredential } from '~sts/exchange';
import { TokenExchangeClient } from '~sts/token-exchange-client';

const request: AssumeRoleRequest = {
    action: 'AssumeRole',
    roleArn: 'qcs::cam::uin/100000000001:roleName/test-role',
    roleSessionName: 'test-session',
    durationSeconds: 7200,
};

const temporary = new Credential('AKIDtmp', 'tmp-secret', 'tmp-token');

describe('when exchanging a credential', () => {
    const sandbox = Sinon.createSandbox();
    let exchange: Sinon.SinonStub<[AssumeRoleRequest], Promise<Credential>>;
    let check: Sinon.SinonStub<[string], Promise<void>>;
    let client: TokenExchangeClient;
    let rateLimiter: RateLimiter;

    beforeEach(() => {
        exchange = sandbox.stub<[AssumeRoleRequest], Promise<Credential>>().resolves(temporary);
        check = sandbox.stub<[string], Promise<void>>().resolves();
        client = { exchange };
        rateLimiter = { check };
    });

    afterEach(() => {
        sandbox.restore();
    });

    test('rate limiter is checked with the action name before the exchange', async () => {
        await exchangeCredential(request, { client, rateLimiter });
        expect(check.callCount).toBe(1);
        expect(check.firstCall.args[0]).toBe('AssumeRole');
        expect(check.calledBefore(exchange)).toBe(true);
    });

    test('temporary credential is returned', async () => {
        const credential = await exchangeCredential(request, { client, rateLimiter });
        expect(credential).toBe(temporary);
    });

    test('exchange failure is wrapped in exchange error', async () => {
        const cause = new Error('network unreachable');
        exchange.rejects(cause);
        const result = exchangeCredential(request, { client, rateLimiter });
        await expect(result).rejects.toThrow(ExchangeError);
        await expect(result).rejects.toMatchObject({ cause });
    });

    test('exchange error from the client is passed on as is', async () => {
        const err = new ExchangeError('no credentials in response');
        exchange.rejects(err);
        await expect(exchangeCredential(request, { client, rateLimiter })).rejects.toBe(err);
    });

    test('api error code and request id are kept', async () => {
        const apiError = Object.assign(new Error('role not found'), { code: 'InvalidParameter.RoleNotExist', requestId: 'test-request-id' });
        exchange.rejects(apiError);
        await expect(exchangeCredential(request, { client, rateLimiter })).rejects.toMatchObject({
            apiCode: 'InvalidParameter.RoleNotExist',
            requestId: 'test-request-id',
        });
    });

    test('rate limiter rejection fails without exchange', async () => {
        check.rejects(new Error('too many requests'));
        await expect(exchangeCredential(request, { client, rateLimiter })).rejects.toThrow('rate limiter rejected AssumeRole: too many requests');
        expect(exchange.called).toBe(false);
    });

    test('aborted signal fails without rate limit check or exchange', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(exchangeCredential(request, { client, rateLimiter, signal: controller.signal })).rejects.toThrow('AssumeRole call was aborted');
        expect(check.called).toBe(false);
        expect(exchange.called).toBe(false);
    });

    test('abort during exchange fails', async () => {
        const controller = new AbortController();
        exchange.callsFake(() => {
            controller.abort();
            return new Promise<Credential>(() => undefined);
        });
        await expect(exchangeCredential(request, { client, rateLimiter, signal: controller.signal })).rejects.toThrow('AssumeRole call was aborted');
    });

    test('exchange exceeding the timeout fails', async () => {
        exchange.returns(new Promise<Credential>(() => undefined));
        await expect(exchangeCredential(request, { client, rateLimiter, timeoutMs: 10 })).rejects.toThrow('AssumeRole call timed out after 10ms');
    });

    test('exchange within the timeout succeeds', async () => {
        const credential = await exchangeCredential(request, { client, rateLimiter, timeoutMs: 1000 });
        expect(credential).toBe(temporary);
    });
});
