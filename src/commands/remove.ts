import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { createInterpreterManager } from '../core/bootstrap';
import { Version } from '../core/version/Version';
import { errorMessage } from '../types/Errors';
import { logger } from '../utils/Logger';

export default class Remove extends Command {
  static override description = 'Remove an installed Python version or a project virtualenv';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 3.11',
    '<%= config.bin %> <%= command.id %> 3.11 --project my-project',
    '<%= config.bin %> <%= command.id %> pypy3.9 --force',
  ];

  static override args = {
    version: Args.string({
      description: 'Python version as it was installed, e.g. 3.11',
      required: true,
    }),
  };

  static override flags = {
    project: Flags.string({
      char: 'p',
      description: 'Remove the virtualenv of this project instead of the interpreter',
    }),
    force: Flags.boolean({
      char: 'f',
      description: 'Remove without confirmation',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Remove);

    try {
      const version = Version.parse(args.version);
      const manager = await createInterpreterManager();
      const target = flags.project
        ? `virtualenv ${flags.project} (${version.toString()})`
        : `Python ${version.toString()}`;

      if (!flags.force && !(await this.getConfirmation(target))) {
        this.log(chalk.yellow('Removal cancelled.'));
        return;
      }

      const removed = flags.project
        ? await manager.removeVirtualenv(flags.project, version)
        : await manager.uninstall(version);

      this.log(chalk.green(`✅ Removed ${target}`));
      this.log(chalk.gray(`   ${removed}`));
    } catch (error) {
      logger.debug('remove failed', error);
      this.error(errorMessage(error), { exit: 1 });
    }
  }

  private async getConfirmation(target: string): Promise<boolean> {
    try {
      const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
        {
          type: 'confirm',
          name: 'confirmed',
          message: `Are you sure you want to remove ${chalk.white(target)}?`,
          default: false,
        },
      ]);
      return confirmed;
    } catch (error) {
      // non-interactive terminals cannot answer the prompt
      logger.warn('Could not prompt for confirmation, defaulting to no', error);
      return false;
    }
  }
}
