import { loadConfig } from './config';
import type { AppConfig } from './config';
import { PasswordGenerator } from './features/generator';
import { PasswordHistory } from './features/history';
import { createLogger, fileSink } from './utils/logger';
import type { Logger } from './utils/logger';
import type { RandomSource } from './utils/random';

/** Everything a command needs; built once at startup and passed down. */
export interface AppServices {
  config: AppConfig;
  logger: Logger;
  generator: PasswordGenerator;
  history: PasswordHistory;
}

export function createServices(config: AppConfig, logger: Logger, random?: RandomSource): AppServices {
  return {
    config,
    logger,
    generator: new PasswordGenerator({ length: config.length, symbols: config.symbols, random }),
    history: new PasswordHistory({ file: config.historyFile, limit: config.historyLimit, logger }),
  };
}

export function bootstrapServices(configPath?: string): AppServices {
  const { config, issues } = loadConfig(configPath);
  const logger = createLogger({ level: config.logLevel, sink: fileSink(config.logFile) });
  for (const issue of issues) logger.warn('ignoring invalid config, using defaults', { issue });
  return createServices(config, logger);
}
