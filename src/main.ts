import { createLogger, setLogLevel } from './core/Logger';
import { ConfigLoader } from './config';
import { Orchestrator } from './core/Orchestrator';
import { ConfigError, IntervalMisconfigurationError } from './core/errors';
import { getDevicePluginRegistry } from './plugins/devices';
import { getOutputPluginRegistry } from './plugins/outputs';

const VERSION = '1.0.0';
const logger = createLogger('Main');

/**
 * Load the configuration, run until the scheduler finishes and shut down.
 * Resolves with the process exit code; unexpected errors reject.
 */
export async function main(configFile: string): Promise<number> {
  logger.info(`plugpoll v${VERSION} starting...`);
  logger.info(`Config file: ${configFile}`);

  let orchestrator: Orchestrator;
  try {
    const config = new ConfigLoader(configFile).load();
    setLogLevel(config.poller.loglevel);
    orchestrator = new Orchestrator(config);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof IntervalMisconfigurationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const devicePlugins = getDevicePluginRegistry();
  const outputPlugins = getOutputPluginRegistry();

  logger.debug(`Device families: ${[...devicePlugins.keys()].join(', ')}`);

  orchestrator.registerPlugins({ devicePlugins, outputPlugins });

  try {
    await orchestrator.start();
  } finally {
    await orchestrator.stop();
  }

  return 0;
}
