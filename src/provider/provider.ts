import { ConfigurationSource } from '~config/configuration-source';
import { PROVIDER_SCHEMA, SchemaMap } from '~config/provider-schema';
import { ClientHandle, ClientHandleReference } from '~connectivity/client-handle';
import { DATA_SOURCES, RESOURCES } from './catalog';
import { configureProvider, ConfigureDependencies } from './provider-configurer';

export class Provider {

    public static Create(dependencies: ConfigureDependencies = {}): Provider {
        return new Provider(dependencies);
    }

    public readonly schema: SchemaMap = PROVIDER_SCHEMA;
    public readonly dataSources: readonly string[] = DATA_SOURCES;
    public readonly resources: readonly string[] = RESOURCES;

    private readonly client = new ClientHandleReference();

    constructor(private readonly dependencies: ConfigureDependencies = {}) {
    }

    /**
     * Resolves the configuration into a client handle and makes it the handle served to
     * every data source and resource. On failure the previous handle (if any) stays in place.
     */
    public async configure(source: ConfigurationSource): Promise<ClientHandle> {
        const handle = await configureProvider(source, this.dependencies);
        this.client.replace(handle);
        return handle;
    }

    public isConfigured(): boolean {
        return this.client.isSet();
    }

    public getClient(): ClientHandle {
        return this.client.get();
    }
}
