// src/config/db.ts
import mongoose from 'mongoose';
import { DatabaseConfig } from './env';

const connectDB = async (config: DatabaseConfig): Promise<void> => {
  try {
    if (!config.uri) {
      throw new Error('MongoDB connection string is not defined');
    }

    await mongoose.connect(config.uri, {
      dbName: config.dbName,
      serverSelectionTimeoutMS: config.timeoutMs,
      socketTimeoutMS: config.timeoutMs * 2,
    });

    console.log(`MongoDB Connected (${config.dbName})`);
  } catch (err) {
    console.error('MongoDB connection error:', err instanceof Error ? err.message : err);
    // Exit process with failure
    process.exit(1);
  }
};

export default connectDB;

export interface DatabaseStatus {
  connected: boolean;
  collections: string[];
  error?: string;
}

export interface DatabaseProbe {
  status(): Promise<DatabaseStatus>;
}

/**
 * Reports on the shared mongoose connection. Never rejects.
 */
export const mongooseProbe: DatabaseProbe = {
  async status() {
    const connection = mongoose.connection;
    if (connection.readyState !== mongoose.ConnectionStates.connected || !connection.db) {
      return { connected: false, collections: [] };
    }
    try {
      const collections = await connection.db.listCollections({}, { nameOnly: true }).toArray();
      return { connected: true, collections: collections.map((c) => c.name).slice(0, 10) };
    } catch (err) {
      return {
        connected: true,
        collections: [],
        error: (err instanceof Error ? err.message : String(err)).slice(0, 50),
      };
    }
  },
};
