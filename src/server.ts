// src/server.ts
import http from 'http';
import dotenv from 'dotenv';
import connectDB from './config/db';
import { loadConfig } from './config/env';
import { createServices } from './services/container';
import { createApp } from './app';

const start = async (): Promise<void> => {
  dotenv.config();
  const config = loadConfig();

  await connectDB(config.database);

  const app = createApp(createServices(config));
  const server = http.createServer(app);

  server.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📍 Environment: ${config.env}`);
    console.log(`📍 Frontend URL: ${config.frontendUrl}`);
  });
};

if (require.main === module) {
  start().catch((err) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}

export default start;
