import { AssumeRoleRequest } from '~credentials/assume-role-request-builder';
import { Credential } from '~credentials/credential';
import { ExchangeError } from '~provider-error';
import { RateLimiter } from '~ratelimit/rate-limiter';
import { ConsoleUtil } from '~util/console-util';
import { TokenExchangeClient } from './token-exchange-client';

export interface ExchangeOptions {
    client: TokenExchangeClient;
    rateLimiter: RateLimiter;
    signal?: AbortSignal;
    /** milliseconds */
    timeoutMs?: number;
}

/**
 * Performs the rate limited role exchange. Any failure, including a rejection by the rate
 * limiter, an abort and a timeout, surfaces as an ExchangeError.
 */
export const exchangeCredential = async (request: AssumeRoleRequest, options: ExchangeOptions): Promise<Credential> => {
    const { client, rateLimiter, signal, timeoutMs } = options;
    if (signal?.aborted) {
        throw new ExchangeError(`${request.action} call was aborted`, signal.reason);
    }

    try {
        await withCancellation(rateLimiter.check(request.action), request.action, signal);
    } catch (err) {
        if (err instanceof ExchangeError) { throw err; }
        throw new ExchangeError(`rate limiter rejected ${request.action}: ${messageOf(err)}`, err);
    }

    ConsoleUtil.LogDebug(`assuming role ${request.roleArn} (session ${request.roleSessionName}, ${request.durationSeconds}s)`);
    try {
        const credential = await withCancellation(client.exchange(request), request.action, signal, timeoutMs);
        ConsoleUtil.RegisterSecret(credential.secret);
        ConsoleUtil.RegisterSecret(credential.sessionToken);
        return credential;
    } catch (err) {
        if (err instanceof ExchangeError) { throw err; }
        throw new ExchangeError(`unable to assume role ${request.roleArn}: ${messageOf(err)}`, err);
    }
};

const withCancellation = <T>(promise: Promise<T>, action: string, signal?: AbortSignal, timeoutMs?: number): Promise<T> => {
    if (signal === undefined && timeoutMs === undefined) {
        return promise;
    }
    return new Promise<T>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined;
        const cleanup = (): void => {
            if (timer !== undefined) { clearTimeout(timer); }
            signal?.removeEventListener('abort', onAbort);
        };
        const onAbort = (): void => {
            cleanup();
            reject(new ExchangeError(`${action} call was aborted`, signal?.reason));
        };

        if (signal?.aborted) {
            onAbort();
            return;
        }
        signal?.addEventListener('abort', onAbort, { once: true });
        if (timeoutMs !== undefined) {
            timer = setTimeout(() => {
                cleanup();
                reject(new ExchangeError(`${action} call timed out after ${timeoutMs}ms`));
            }, timeoutMs);
        }
        promise.then(
            value => { cleanup(); resolve(value); },
            (err: unknown) => { cleanup(); reject(err); },
        );
    });
};

const messageOf = (err: unknown): string => {
    return err instanceof Error ? err.message : String(err);
};
