import { EnvironmentCreationError, FilesystemError } from '../types/Errors';
import { FileSystem } from '../utils/FileSystem';
import { ProcessUtils } from '../utils/ProcessUtils';
import { logger } from '../utils/Logger';

export const TERMINFO_DIRS = '/etc/terminfo:/lib/terminfo:/usr/share/terminfo';

export class EnvironmentProvisioner {
  async createVirtualenv(python: string, venvDir: string): Promise<void> {
    if (!(await FileSystem.isExecutable(python))) {
      throw new FilesystemError(python, `No Python interpreter at ${python}`);
    }

    logger.debug(`Running ${python} -m venv ${venvDir}`);
    try {
      const result = await ProcessUtils.execute(python, ['-m', 'venv', venvDir]);
      if (result.exitCode !== 0) {
        throw new EnvironmentCreationError(venvDir, result.exitCode, result.stderr);
      }
    } catch (error) {
      // venv creates the directory before it can fail; a leftover would pass for a ready env
      await FileSystem.remove(venvDir);
      throw error;
    }
  }

  /**
   * Start an interactive bash with `env` and wait for it to exit.
   */
  async spawnShell(env: NodeJS.ProcessEnv): Promise<number> {
    return ProcessUtils.interactive('bash', [], env);
  }
}
