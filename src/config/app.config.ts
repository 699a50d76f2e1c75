import path from 'path';

export interface AppConfig {
  port: number;
  databasePath: string;
  sqlDir: string;
  nodeEnv: string;
}

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: parseInt(env.PORT || '3000', 10),
  databasePath: env.DATABASE_PATH || 'sample.db',
  sqlDir: path.resolve(env.SQL_DIR || 'sql'),
  nodeEnv: env.NODE_ENV || 'production',
});
