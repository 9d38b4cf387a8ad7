import dotenv from 'dotenv';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv,
  },
  auction: {
    lockTimeout: parseInt(process.env.LOCK_TIMEOUT || '2000', 10),
    creationGracePeriod: parseInt(process.env.CREATION_GRACE_PERIOD || '180000', 10), // 3 minutes
  },
  logging: {
    level: process.env.LOG_LEVEL || (nodeEnv === 'development' ? 'debug' : 'info'),
  },
};
