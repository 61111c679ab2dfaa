import morgan, { StreamOptions } from 'morgan';
import { Logging } from '../utils';
import { env } from '../config';

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    Logging.info(message.trim());
  },
};

const skip = (): boolean => env.NODE_ENV === 'test';

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
