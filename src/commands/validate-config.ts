import { Command } from 'commander';
import { buildAssumeRoleRequest } from '~credentials/assume-role-request-builder';
import { readProviderConfig } from '~provider/provider-configurer';
import { ClientHandle } from '~connectivity/client-handle';
import { ConsoleUtil } from '~util/console-util';
import { EnvironmentProvider, ProcessEnvironment } from '~util/environment';
import { BaseCliCommand, ICommandArgs } from './base-command';
import { describeClientHandle } from './configure';

const commandName = 'validate-config';
const commandDescription = 'validates the provider configuration without calling any API';

export class ValidateConfigCommand extends BaseCliCommand<ICommandArgs> {

    public static async Perform(command: ICommandArgs): Promise<void> {
        const x = new ValidateConfigCommand();
        await x.performCommand(command);
    }

    constructor(command?: Command, private readonly env: EnvironmentProvider = new ProcessEnvironment()) {
        super(command, commandName, commandDescription);
    }

    public async performCommand(command: ICommandArgs): Promise<void> {
        const source = this.createConfigurationSource(command);
        const config = readProviderConfig(source);
        source.validate();

        const handle = new ClientHandle(config.credential, config.region, config.protocol, config.domain);
        for (const line of describeClientHandle(handle)) {
            ConsoleUtil.Out(line);
        }

        if (config.assumeRole !== undefined) {
            const request = buildAssumeRoleRequest(config.assumeRole, this.env);
            ConsoleUtil.Out(`assume role: ${request.roleArn}`);
            ConsoleUtil.Out(`session name: ${request.roleSessionName}`);
            ConsoleUtil.Out(`session duration: ${request.durationSeconds}`);
            ConsoleUtil.Out(`policy: ${request.policy !== undefined ? 'yes' : 'no'}`);
        }
        ConsoleUtil.LogInfo('provider configuration is valid');
    }
}
