// node/src/services/logger.ts — structured logging for backend
import { Logger, type ILogObj } from 'tslog';
import { appConfig, type LogLevelName } from '@/config/app.config';

const LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'funding-finder',
  minLevel: LEVELS[appConfig.log.level],
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: appConfig.log.type,
});
