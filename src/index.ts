import { createLogger } from './core/Logger';
import { DEFAULT_CONFIG_FILE } from './config';
import { describeError } from './core/errors';
import { main } from './main';

const logger = createLogger('Main');

main(process.env.CONF_FILE || DEFAULT_CONFIG_FILE)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`Fatal error: ${describeError(error)}`);
    process.exitCode = 1;
  });
