import { Command } from 'commander';
import { Provider } from '~provider/provider';
import { ConsoleUtil } from '~util/console-util';
import { BaseCliCommand, ICommandArgs } from './base-command';

const commandName = 'list-resources';
const commandDescription = 'lists the data sources and resources served by the provider';

export class ListResourcesCommand extends BaseCliCommand<ICommandArgs> {

    public static async Perform(command: ICommandArgs): Promise<void> {
        const x = new ListResourcesCommand();
        await x.performCommand(command);
    }

    constructor(command?: Command) {
        super(command, commandName, commandDescription);
    }

    public async performCommand(_command: ICommandArgs): Promise<void> {
        const provider = Provider.Create();
        ConsoleUtil.Out('data sources:');
        for (const name of provider.dataSources) {
            ConsoleUtil.Out(`  ${name}`);
        }
        ConsoleUtil.Out('resources:');
        for (const name of provider.resources) {
            ConsoleUtil.Out(`  ${name}`);
        }
    }
}
