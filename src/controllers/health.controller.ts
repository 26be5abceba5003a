// src/controllers/health.controller.ts
import { Request, Response } from 'express';
import { DatabaseProbe } from '../config/db';
import { DatabaseConfig } from '../config/env';

export const createHealthController = (probe: DatabaseProbe, databaseConfig: DatabaseConfig) => ({
  root: async (req: Request, res: Response): Promise<Response> => {
    return res.json({ message: 'Region Swap API running' });
  },

  /**
   * @route   GET /test
   * @desc    Backend and database status, for deploy checks
   * @access  Public
   */
  status: async (req: Request, res: Response): Promise<Response> => {
    const db = await probe.status();

    let database = 'Not Available';
    if (db.connected) {
      database = db.error ? `Connected but Error: ${db.error}` : 'Connected & Working';
    }

    return res.json({
      backend: 'Running',
      database,
      database_url: databaseConfig.uri ? 'Set' : 'Not Set',
      database_name: databaseConfig.dbName ? 'Set' : 'Not Set',
      connection_status: db.connected ? 'Connected' : 'Not Connected',
      collections: db.collections
    });
  }
});
