import { ConfigManager } from './ConfigManager';
import { InterpreterManager } from './InterpreterManager';
import { logger } from '../utils/Logger';

export interface BootstrapOptions {
  verbose?: boolean;
}

/**
 * Load settings once and build the manager every command works through.
 */
export async function createInterpreterManager(
  options: BootstrapOptions = {}
): Promise<InterpreterManager> {
  const settings = await ConfigManager.getInstance().load();
  logger.setLevel(options.verbose ? 'debug' : settings.logLevel);
  logger.debug(`Data dir ${settings.dataDir}, cache dir ${settings.cacheDir}`);
  return InterpreterManager.fromSettings(settings);
}
