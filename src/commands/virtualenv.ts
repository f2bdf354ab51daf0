import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { createInterpreterManager } from '../core/bootstrap';
import { Version } from '../core/version/Version';
import { errorMessage } from '../types/Errors';
import { logger } from '../utils/Logger';

export default class Virtualenv extends Command {
  static override description = 'Create a virtualenv given a Python version and a project name';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 3.11 my-project',
    '<%= config.bin %> <%= command.id %> pypy3.9 my-project',
  ];

  static override args = {
    version: Args.string({
      description: 'Python version, e.g. 3.11 or pypy3.9',
      required: true,
    }),
    project: Args.string({
      description: 'Project name',
      required: true,
    }),
  };

  static override flags = {
    verbose: Flags.boolean({
      char: 'v',
      description: 'Show debug output',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Virtualenv);

    try {
      const version = Version.parse(args.version);
      const manager = await createInterpreterManager({ verbose: flags.verbose });
      const venvDir = await manager.ensureVenv(version, args.project);

      this.log(chalk.green(`✅ Virtualenv for ${args.project} (${version.toString()}) ready`));
      this.log(chalk.gray(`   ${venvDir}`));
    } catch (error) {
      logger.debug('virtualenv failed', error);
      this.error(errorMessage(error), { exit: 1 });
    }
  }
}
