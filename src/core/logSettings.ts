export interface LogSettings {
  level: string;
  folder: string;
  /** Write plugpoll.log and plugpoll-error.log next to the console output */
  files: boolean;
}

export const DEFAULT_LOG_FOLDER = './logs';

/**
 * Logger settings from the environment. LOG_FILES=false keeps a one-shot run
 * (cron, container job) on the console only.
 */
export function resolveLogSettings(env: NodeJS.ProcessEnv): LogSettings {
  return {
    level: env.LOG_LEVEL || 'info',
    folder: env.LOG_FOLDER || DEFAULT_LOG_FOLDER,
    files: env.LOG_FILES?.toLowerCase() !== 'false',
  };
}
