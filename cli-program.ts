import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { ConfigureCommand, ListResourcesCommand, ValidateConfigCommand } from './src/commands/index';

export class CliProgram {

    public static Create(): Command {
        const p = new CliProgram();
        return p.getCommand();
    }

    private static GetVersion(): string {
        for (const candidate of [path.join(__dirname, '..', 'package.json'), path.join(__dirname, 'package.json')]) {
            if (!existsSync(candidate)) { continue; }
            const pjson: unknown = JSON.parse(readFileSync(candidate).toString());
            if (typeof pjson === 'object' && pjson !== null && 'version' in pjson && typeof pjson.version === 'string') {
                return pjson.version;
            }
        }
        return '0.0.0';
    }

    private readonly program: Command;

    constructor() {
        this.program = new Command();
        this.program.name('tc-provider');
        this.program.version(CliProgram.GetVersion(), '-v, --version');
        this.program.description('tencentcloud provider credential resolution');

        new ConfigureCommand(this.program);
        new ListResourcesCommand(this.program);
        new ValidateConfigCommand(this.program);
    }

    public getCommand(): Command {
        return this.program;
    }
}
