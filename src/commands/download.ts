import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { createInterpreterManager } from '../core/bootstrap';
import { Version } from '../core/version/Version';
import { errorMessage } from '../types/Errors';
import { logger } from '../utils/Logger';

export default class Download extends Command {
  static override description =
    'Download a specific Python version or list all Python versions available to download';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> 3.11',
    '<%= config.bin %> <%= command.id %> pypy3.9',
  ];

  static override args = {
    version: Args.string({
      description: 'Python version, e.g. 3.11, 3.11.4 or pypy3.9',
      required: false,
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
    const { args, flags } = await this.parse(Download);

    try {
      const manager = await createInterpreterManager({ verbose: flags.verbose });

      if (args.version === undefined) {
        const { releases, failures } = await manager.listAvailable();
        for (const release of releases) {
          this.log(`${release.version.toString()} (${release.releaseTag})`);
        }
        if (failures.length > 0) {
          logger.warn(`${failures.length} upstream entries could not be parsed and were skipped`);
        }
        return;
      }

      const version = Version.parse(args.version);
      const spinner = ora(`Installing Python ${version.toString()}...`).start();
      try {
        const installedDir = await manager.ensureInstalled(version);
        spinner.succeed(`Python ${version.toString()} is installed`);
        this.log(chalk.gray(`   ${installedDir}`));
      } catch (error) {
        spinner.fail(`Failed to install Python ${version.toString()}`);
        throw error;
      }
    } catch (error) {
      logger.debug('download failed', error);
      this.error(errorMessage(error), { exit: 1 });
    }
  }
}
