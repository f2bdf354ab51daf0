import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { createInterpreterManager } from '../core/bootstrap';
import { InstalledInterpreter, VirtualenvInfo } from '../types/Runtime';
import { errorMessage } from '../types/Errors';
import { logger } from '../utils/Logger';

export default class List extends Command {
  static override description = 'List installed Python versions and virtualenvs';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: 'Show install paths',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(List);

    try {
      const manager = await createInterpreterManager();
      const interpreters = await manager.listInstalled();
      const virtualenvs = await manager.listVirtualenvs();

      if (flags.json) {
        this.outputJson(interpreters, virtualenvs);
      } else {
        this.outputTable(interpreters, virtualenvs, flags.verbose);
      }
    } catch (error) {
      logger.debug('list failed', error);
      this.error(errorMessage(error), { exit: 1 });
    }
  }

  private outputJson(interpreters: InstalledInterpreter[], virtualenvs: VirtualenvInfo[]): void {
    const output = {
      interpreters: interpreters.map(({ version, path }) => ({
        version: version.toString(),
        family: version.family,
        path,
      })),
      virtualenvs,
    };

    this.log(JSON.stringify(output, null, 2));
  }

  private outputTable(
    interpreters: InstalledInterpreter[],
    virtualenvs: VirtualenvInfo[],
    verbose: boolean
  ): void {
    if (interpreters.length === 0) {
      this.log(chalk.yellow('📭 No Python versions installed.'));
      this.log(chalk.gray(`   Run ${chalk.white('pyroost download <version>')} to install one.`));
    } else {
      this.log(chalk.blue('🐍 Installed Python versions:'));
      for (const { version, path } of interpreters) {
        this.log(`   ${chalk.white(version.toString())}${verbose ? chalk.gray(`  ${path}`) : ''}`);
      }
    }

    if (virtualenvs.length > 0) {
      this.log(chalk.blue('\n📦 Virtualenvs:'));
      for (const venv of virtualenvs) {
        const location = verbose ? chalk.gray(`  ${venv.path}`) : '';
        this.log(`   ${chalk.white(venv.project)} ${chalk.gray(`[${venv.version}]`)}${location}`);
      }
    }
  }
}
