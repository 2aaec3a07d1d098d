import type pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';

const STDERR_DESTINATION = 2;

/**
 * Pretty printing in local development when pino-pretty is installed.
 * Returns undefined otherwise, in which case the logger writes JSON to stderr
 * in-process (stdout is reserved for extraction output).
 */
export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();
  const isDevelopment = env.NODE_ENV === 'development';
  let pinoPrettyResolved: boolean;
  try {
    require.resolve('pino-pretty');
    pinoPrettyResolved = true;
  } catch {
    pinoPrettyResolved = false;
  }

  if (pinoPrettyResolved && isDevelopment && !isRunningInDocker()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION,
      },
    };
  }
  return undefined;
}
