import { Logger } from 'tslog';

// tslogのログレベル定義: 0: silly, 1: trace, 2: debug, 3: info, 4: warn, 5: error, 6: fatal
export const logger = new Logger({
  name: 'groupme-downloader',
  type: process.env.LOG_TYPE === 'hidden' ? 'hidden' : 'pretty',
  minLevel: process.env.DEBUG ? 2 : 3,
});
