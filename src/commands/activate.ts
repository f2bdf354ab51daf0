import { Args, Command, Flags } from '@oclif/core';
import { createInterpreterManager } from '../core/bootstrap';
import { Version } from '../core/version/Version';
import { errorMessage } from '../types/Errors';
import { logger } from '../utils/Logger';

export default class Activate extends Command {
  static override description =
    'Activate a virtualenv given a Python version and a project name, creating it if needed';

  static override examples = ['<%= config.bin %> <%= command.id %> 3.11 my-project'];

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
    const { args, flags } = await this.parse(Activate);

    let exitCode: number;
    try {
      const version = Version.parse(args.version);
      const manager = await createInterpreterManager({ verbose: flags.verbose });
      exitCode = await manager.activate(version, args.project);
    } catch (error) {
      logger.debug('activate failed', error);
      return this.error(errorMessage(error), { exit: 1 });
    }

    // Propagate the status of the last command run in the shell
    if (exitCode !== 0) {
      this.exit(exitCode);
    }
  }
}
