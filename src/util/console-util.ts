const MASK = '******';
const secrets: Set<string> = new Set();

export class ConsoleUtil {

    public static printStacktraces = false;
    public static verbose = false;
    public static colorizeLogs = true;

    /**
     * Registers a sensitive value (secret key, session token) that must never be written
     * to the console. Every log line is scrubbed against the registered values.
     */
    public static RegisterSecret(secret: string | undefined): void {
        if (secret === undefined || secret === '') { return; }
        secrets.add(secret);
    }

    public static UnregisterSecret(secret: string | undefined): void {
        if (secret === undefined || secret === '') { return; }
        secrets.delete(secret);
    }

    public static ClearSecrets(): void {
        secrets.clear();
    }

    public static LogDebug(message: string): void {
        if (!ConsoleUtil.verbose) { return; }
        console.debug(`DEBG: ${maskSecrets(message)}`);
    }

    public static Out(message: string): void {
        console.log(maskSecrets(message));
    }

    public static LogInfo(message: string): void {
        console.log(`INFO: ${maskSecrets(message)}`);
    }

    public static LogWarning(message: string): void {
        const formatted = `WARN: ${maskSecrets(message)}`;
        console.warn(yellow(formatted));
    }

    public static LogError(message: string, err?: Error): void {
        const formatted = `ERROR: ${maskSecrets(message)}`;
        console.error(red(formatted));

        if (err !== undefined) {
            if (ConsoleUtil.printStacktraces) {
                console.error(red(maskSecrets(`${err.message}\n${err.stack}`)));
            } else {
                console.error(red(`${maskSecrets(err.message)} (use option --print-stack to print stack)`));
            }
        }
    }
}

/**
 * Shows the first four characters of an identifier followed by a mask, e.g. `AKID******`.
 */
export const maskIdentifier = (value: string): string => {
    if (value.length <= 4) {
        return MASK;
    }
    return value.substring(0, 4) + MASK;
};

const red = (message: string): string => {
    return ConsoleUtil.colorizeLogs ? `\x1b[31m${message}\x1b[0m` : message;
};

const yellow = (message: string): string => {
    return ConsoleUtil.colorizeLogs ? `\x1b[33m${message}\x1b[0m` : message;
};

const maskSecrets = (message: string): string => {
    let result = message;
    for (const secret of secrets) {
        result = result.split(secret).join(MASK);
    }
    return result;
};
