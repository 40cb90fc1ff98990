export type LedgerStoreDriver = 'mongo' | 'memory';

const int = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const resolveLedgerStoreDriver = (
  value: string | undefined = process.env.LEDGER_STORE,
): LedgerStoreDriver => (value === 'memory' ? 'memory' : 'mongo');

export default () => ({
  port: int(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  ledger: {
    store: resolveLedgerStoreDriver(),
    // price of one drink in cents
    drinkPriceCents: int(process.env.DRINK_PRICE_CENTS, 100),
    // new postpaid users start deactivated unless configured otherwise
    activateNewPostpaidUsers: process.env.ACTIVATE_NEW_POSTPAID_USERS === 'true',
    userKeyBytes: int(process.env.USER_KEY_BYTES, 6),
  },
  mongodb: {
    // transactions need a replica set, even a single-node one
    uri:
      process.env.MONGODB_URI ||
      'mongodb://localhost:27017/drinks_ledger?replicaSet=rs0',
    maxPoolSize: int(process.env.MONGO_MAX_POOL_SIZE, 20),
    minPoolSize: int(process.env.MONGO_MIN_POOL_SIZE, 2),
    maxIdleTimeMS: int(process.env.MONGO_MAX_IDLE_TIME_MS, 30000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: int(process.env.REDIS_PORT, 6379),
    lockEnabled: process.env.REDIS_LOCKS_ENABLED === 'true',
    lockTtlSeconds: int(process.env.REDIS_LOCK_TTL_SECONDS, 10),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  jwt: {
    // shared with the identity provider that signs member tokens
    secret: process.env.JWT_SECRET || 'default-secret-key',
    // lifetime of prepaid session tokens issued by POST /auth/prepaid
    expiresIn: process.env.JWT_EXPIRES_IN || '12h',
  },
  auth: {
    memberGroup: process.env.AUTH_MEMBER_GROUP || 'drinks',
    adminGroup: process.env.AUTH_ADMIN_GROUP || 'drinks-admin',
    loginUrl: process.env.AUTH_LOGIN_URL || '/login',
  },
  // Rate limiting, GET requests are never throttled
  throttle: {
    shortTtl: int(process.env.THROTTLE_SHORT_TTL, 1000),
    shortLimit: int(process.env.THROTTLE_SHORT_LIMIT, 10),
    mediumTtl: int(process.env.THROTTLE_MEDIUM_TTL, 10000),
    mediumLimit: int(process.env.THROTTLE_MEDIUM_LIMIT, 50),
    longTtl: int(process.env.THROTTLE_LONG_TTL, 60000),
    longLimit: int(process.env.THROTTLE_LONG_LIMIT, 200),
  },
  // Example: CORS_ORIGINS=https://drinks.example.org,https://admin.example.org
  cors: {
    origins: process.env.CORS_ORIGINS || 'http://localhost:3000',
  },
});
