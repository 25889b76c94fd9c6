import { registerAs } from '@nestjs/config';

export const databaseConfig = registerAs('database', () => ({
  host: process.env.DATABASE_HOST ?? 'localhost',
  port: parseInt(process.env.DATABASE_PORT ?? '5432', 10),
  user: process.env.DATABASE_USER ?? 'postgres',
  password: process.env.DATABASE_PASSWORD ?? 'postgres',
  name: process.env.DATABASE_NAME ?? 'cinema',
  // every in-flight sale holds one connection until commit
  poolSize: parseInt(process.env.DATABASE_POOL_SIZE ?? '20', 10),
}));
