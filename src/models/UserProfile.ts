// src/models/UserProfile.ts
import mongoose, { Schema } from 'mongoose';

export interface IUserProfile {
  email: string;
  name: string;
  nip?: string;
  agency: string;
  position: string;
  grade: string;
  current_region: string;
  desired_region: string;
  is_subscribed: boolean;
  is_verified: boolean;
  created_at?: Date;
  updated_at?: Date;
}

const userProfileSchema = new Schema<IUserProfile>({
  email: { type: String, required: true, unique: true, lowercase: true, trim: true },
  name: { type: String, required: true, trim: true },
  nip: { type: String, trim: true },
  agency: { type: String, required: true, trim: true },
  position: { type: String, required: true, trim: true },
  grade: { type: String, required: true, trim: true },
  current_region: { type: String, required: true, trim: true },
  desired_region: { type: String, required: true, trim: true },
  is_subscribed: { type: Boolean, default: false },
  is_verified: { type: Boolean, default: false }
}, {
  collection: 'userprofile',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' }
});

// Search filters
userProfileSchema.index({ desired_region: 1 });
userProfileSchema.index({ current_region: 1 });

const UserProfile = mongoose.model<IUserProfile>('UserProfile', userProfileSchema);
export default UserProfile;
