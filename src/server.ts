import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadAppConfig } from './config/app.config';
import { openDatabase } from './db';
import { createApp } from './app';

const config = loadAppConfig();
const db = openDatabase(config.databasePath);
const app = createApp({ db, config });

const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`Server running on port ${config.port} (${config.nodeEnv})`);
  console.log(`Database: ${config.databasePath}, SQL files: ${config.sqlDir}`);
});

const shutdown = (signal: string) => {
  console.log(`${signal} received, closing server`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
