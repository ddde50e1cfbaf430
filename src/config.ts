/**
 * Environment configuration
 * Every setting has a default so the service starts with only DATABASE_URL set
 */

export interface AppConfig {
  port: number;
  serviceName: string;
  nodeEnv: string;
  logLevel: string;
  database: {
    connectionString?: string;
    poolSize: number;
    schema: string;
  };
  kafka: {
    brokers: string[]; // Consumer is disabled when empty
    groupId: string;
    username?: string;
    password?: string;
    ssl: boolean;
  };
  engine: {
    maxFrontierPops: number;
    defaultAlternatives: number;
    currency: string;
  };
}

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function listFrom(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const serviceName = env.SERVICE_NAME || 'route-fare-engine';

  return {
    port: intFrom(env.PORT, 3000),
    serviceName,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    database: {
      connectionString: env.DATABASE_URL || undefined,
      poolSize: intFrom(env.DB_POOL_SIZE, 10),
      schema: env.DB_SCHEMA || 'route_engine',
    },
    kafka: {
      brokers: listFrom(env.KAFKA_BROKERS),
      groupId: env.KAFKA_GROUP_ID || `${serviceName}-consumers`,
      username: env.KAFKA_USERNAME || undefined,
      password: env.KAFKA_PASSWORD || undefined,
      ssl: env.KAFKA_SSL === 'true',
    },
    engine: {
      maxFrontierPops: intFrom(env.SEARCH_MAX_FRONTIER_POPS, 10_000),
      defaultAlternatives: intFrom(env.DEFAULT_ALTERNATIVES, 3),
      currency: env.FARE_CURRENCY || 'THB',
    },
  };
}
