/**
 * Read access to environment variables. Resolution code takes one of these instead of
 * reading `process.env`, so tests can hand in a fixed set of variables.
 */
export interface EnvironmentProvider {
    get(name: string): string | undefined;
}

export class ProcessEnvironment implements EnvironmentProvider {
    public get(name: string): string | undefined {
        const value = process.env[name];
        return value === '' ? undefined : value;
    }
}

export class StaticEnvironment implements EnvironmentProvider {
    private readonly values: Map<string, string>;

    constructor(values: Record<string, string | undefined> = {}) {
        this.values = new Map();
        for (const [name, value] of Object.entries(values)) {
            if (value !== undefined && value !== '') {
                this.values.set(name, value);
            }
        }
    }

    public get(name: string): string | undefined {
        return this.values.get(name);
    }
}
