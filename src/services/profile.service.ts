// src/services/profile.service.ts
import { FilterQuery, UpdateQuery } from 'mongoose';
import UserProfile, { IUserProfile } from '../models/UserProfile';
import { escapeRegex } from '../utils/regex';
import { ServiceUnavailableError } from '../utils/errors';

export interface ProfileInput {
  name: string;
  nip?: string;
  agency: string;
  position: string;
  grade: string;
  current_region: string;
  desired_region: string;
}

export interface ProfileFilters {
  desired_region?: string;
  current_region?: string;
  agency?: string;
}

export type Profile = Omit<IUserProfile, 'created_at' | 'updated_at'>;

export type UpsertResult = 'created' | 'updated';

export interface ProfileRepository {
  upsert(email: string, input: ProfileInput): Promise<UpsertResult>;
  findByEmail(email: string): Promise<Profile | null>;
  /** Case-insensitive substring match on every filter given. */
  search(filters: ProfileFilters): Promise<Profile[]>;
  list(): Promise<Profile[]>;
  setVerified(email: string, verified: boolean): Promise<boolean>;
  remove(email: string): Promise<boolean>;
}

const toProfile = (doc: IUserProfile): Profile => ({
  email: doc.email,
  name: doc.name,
  nip: doc.nip,
  agency: doc.agency,
  position: doc.position,
  grade: doc.grade,
  current_region: doc.current_region,
  desired_region: doc.desired_region,
  is_subscribed: doc.is_subscribed,
  is_verified: doc.is_verified,
});

const wrap = async <T>(operation: string, run: () => Promise<T>): Promise<T> => {
  try {
    return await run();
  } catch (err) {
    console.error(`Profile ${operation} failed:`, err instanceof Error ? err.message : err);
    throw new ServiceUnavailableError('Database not available');
  }
};

export class MongoProfileRepository implements ProfileRepository {
  upsert(email: string, input: ProfileInput): Promise<UpsertResult> {
    return wrap('upsert', async () => {
      // The body replaces the profile, so a missing NIP clears the stored one
      const { nip, ...fields } = input;
      const update: UpdateQuery<IUserProfile> = {
        $set: nip === undefined ? { ...fields, email } : { ...fields, nip, email },
        $setOnInsert: { is_subscribed: false, is_verified: false },
      };
      if (nip === undefined) {
        update.$unset = { nip: '' };
      }
      const result = await UserProfile.updateOne({ email }, update, { upsert: true, runValidators: true });
      return result.upsertedCount > 0 ? 'created' : 'updated';
    });
  }

  findByEmail(email: string): Promise<Profile | null> {
    return wrap('lookup', async () => {
      const doc = await UserProfile.findOne({ email }).lean();
      return doc ? toProfile(doc) : null;
    });
  }

  search(filters: ProfileFilters): Promise<Profile[]> {
    return wrap('search', async () => {
      const query: FilterQuery<IUserProfile> = {};
      if (filters.desired_region) {
        query.desired_region = { $regex: escapeRegex(filters.desired_region), $options: 'i' };
      }
      if (filters.current_region) {
        query.current_region = { $regex: escapeRegex(filters.current_region), $options: 'i' };
      }
      if (filters.agency) {
        query.agency = { $regex: escapeRegex(filters.agency), $options: 'i' };
      }
      const docs = await UserProfile.find(query).sort({ created_at: -1 }).lean();
      return docs.map(toProfile);
    });
  }

  list(): Promise<Profile[]> {
    return wrap('list', async () => {
      const docs = await UserProfile.find({}).sort({ created_at: -1 }).lean();
      return docs.map(toProfile);
    });
  }

  setVerified(email: string, verified: boolean): Promise<boolean> {
    return wrap('verify', async () => {
      const result = await UserProfile.updateOne({ email }, { $set: { is_verified: verified } });
      return result.matchedCount > 0;
    });
  }

  remove(email: string): Promise<boolean> {
    return wrap('delete', async () => {
      const result = await UserProfile.deleteOne({ email });
      return result.deletedCount > 0;
    });
  }
}
