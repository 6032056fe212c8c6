import pino from 'pino';
import { getLogConfig, type LogConfig } from './config.js';
import { resolvePackagePath } from './paths.js';

// Determine transport based on config; undefined means plain JSON on stdout
export function getTransport(config: LogConfig): pino.TransportSingleOptions | pino.TransportMultiOptions | undefined {
  if (config.target === 'file') {
    return {
      targets: [
        {
          target: 'pino/file',
          options: {
            destination: resolvePackagePath(config.filePath),
            mkdir: true,
          },
          level: config.level,
        },
        // Always show warnings and errors in terminal (stderr), without stacks
        {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,time,stack,err,error',
            messageFormat: '{if msg}{msg}{end}{if error.message}{if msg}: {end}{error.message}{end}',
            destination: 2, // stderr
          },
          level: 'warn',
        },
      ],
    };
  }

  if (!config.pretty) return undefined;

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: true,
    },
  };
}

// Create logger instance with given config
export function createLogger(config: LogConfig): pino.Logger {
  return pino({
    level: config.level,
    transport: getTransport(config),
    // Log calls pass errors under `error`, not `err`
    serializers: { error: pino.stdSerializers.err },
  });
}

// Silent until initLogger() runs: shims may log on any call and must not
// read config files or start transport workers to do so
let _logger: pino.Logger = pino({ level: 'silent' });

// Install the module logger
export function initLogger(config: LogConfig): void {
  _logger = createLogger(config);
}

// Install the module logger from config.defaults.yaml / config.yaml
export function initLoggerFromConfig(): void {
  initLogger(getLogConfig());
}

export function getLogger(): pino.Logger {
  return _logger;
}

// Resolves getLogger() on each property access, so initLogger() takes effect everywhere
export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    return Reflect.get(getLogger(), prop);
  },
});
