import { Command } from 'commander';
import { SettingsConfigurationSource } from '~config/configuration-source';
import { ClientHandle } from '~connectivity/client-handle';
import { Provider } from '~provider/provider';
import { ConfigureDependencies } from '~provider/provider-configurer';
import { ConsoleUtil, maskIdentifier } from '~util/console-util';
import { BaseCliCommand, ICommandArgs } from './base-command';

const commandName = 'configure';
const commandDescription = 'resolves credentials (assuming a role when configured) and prints the resulting client configuration';

export class ConfigureCommand extends BaseCliCommand<IConfigureCommandArgs> {

    public static async Perform(command: IConfigureCommandArgs): Promise<void> {
        const x = new ConfigureCommand();
        await x.performCommand(command);
    }

    constructor(command?: Command, private readonly dependencies: ConfigureDependencies = {}) {
        super(command, commandName, commandDescription);
    }

    public addOptions(command: Command): void {
        command.option('--timeout <seconds>', 'maximum time to wait for the AssumeRole call');
        super.addOptions(command);
    }

    public async performCommand(command: IConfigureCommandArgs): Promise<void> {
        const source = this.createConfigurationSource(command);
        const dependencies: ConfigureDependencies = { ...this.dependencies };
        if (command.timeout !== undefined) {
            dependencies.timeoutMs = SettingsConfigurationSource.ParseInt(command.timeout, 'timeout') * 1000;
        }

        const provider = Provider.Create(dependencies);
        const handle = await provider.configure(source);
        for (const line of describeClientHandle(handle)) {
            ConsoleUtil.Out(line);
        }
    }
}

export const describeClientHandle = (handle: ClientHandle): string[] => {
    return [
        `region: ${handle.region}`,
        `protocol: ${handle.protocol}`,
        `domain: ${handle.rootDomain()}`,
        `sts endpoint: ${handle.endpointFor('sts')}`,
        `secret id: ${maskIdentifier(handle.credential.id)}`,
        `temporary credential: ${handle.credential.isTemporary() ? 'yes' : 'no'}`,
    ];
};

export interface IConfigureCommandArgs extends ICommandArgs {
    timeout?: string;
}
