// src/services/passcode.store.ts
import mongoose from 'mongoose';
import Passcode, { purgeDateFor } from '../models/Passcode';
import { ServiceUnavailableError } from '../utils/errors';

export interface PasscodeRecord {
  email: string;
  code: string;
  purpose: string;
  expires_at: number;
}

export interface StoredPasscode extends PasscodeRecord {
  id: string;
}

/**
 * Raised by `insert` when another record for the same email is already
 * outstanding, i.e. a concurrent issue got there first.
 */
export class DuplicatePasscodeError extends Error {
  constructor(email: string) {
    super(`A passcode is already outstanding for ${email}`);
    this.name = 'DuplicatePasscodeError';
  }
}

/**
 * Outstanding one-time passcodes, keyed by email. Records are never updated
 * in place; at most one may exist per email.
 */
export interface PasscodeStore {
  insert(record: PasscodeRecord): Promise<void>;
  findMatch(email: string, code: string): Promise<StoredPasscode | null>;
  /** Delete a single record. Resolves false when it was already gone. */
  consume(id: string): Promise<boolean>;
  /** Delete every record for the email; resolves with how many went. */
  invalidate(email: string): Promise<number>;
}

export const isDuplicateKey = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

const unavailable = (operation: string, err: unknown): ServiceUnavailableError => {
  console.error(`Passcode store ${operation} failed:`, err instanceof Error ? err.message : err);
  return new ServiceUnavailableError('Passcode store unavailable');
};

export class MongoPasscodeStore implements PasscodeStore {
  async insert(record: PasscodeRecord): Promise<void> {
    try {
      await Passcode.create({ ...record, purgeAt: purgeDateFor(record.expires_at) });
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new DuplicatePasscodeError(record.email);
      }
      throw unavailable('insert', err);
    }
  }

  async findMatch(email: string, code: string): Promise<StoredPasscode | null> {
    try {
      const doc = await Passcode.findOne({ email, code }).lean();
      if (!doc) return null;
      return {
        id: doc._id.toString(),
        email: doc.email,
        code: doc.code,
        purpose: doc.purpose,
        expires_at: doc.expires_at,
      };
    } catch (err) {
      throw unavailable('lookup', err);
    }
  }

  async consume(id: string): Promise<boolean> {
    try {
      const result = await Passcode.deleteOne({ _id: id });
      return result.deletedCount === 1;
    } catch (err) {
      throw unavailable('consume', err);
    }
  }

  async invalidate(email: string): Promise<number> {
    try {
      const result = await Passcode.deleteMany({ email });
      return result.deletedCount;
    } catch (err) {
      throw unavailable('invalidate', err);
    }
  }
}
