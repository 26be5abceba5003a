// src/models/Passcode.ts
import mongoose, { Schema } from 'mongoose';

// Expired records are kept this long so a late verify still reports "expired"
const PURGE_GRACE_SECONDS = 24 * 60 * 60;

export interface IPasscode {
  email: string;
  code: string;
  purpose: string;
  expires_at: number; // unix seconds
  purgeAt: Date;
}

const passcodeSchema = new Schema<IPasscode>({
  email: {
    type: String,
    required: true,
    unique: true
  },
  code: {
    type: String,
    required: true,
    match: /^\d{6}$/
  },
  purpose: {
    type: String,
    default: 'login'
  },
  expires_at: {
    type: Number,
    required: true
  },
  purgeAt: {
    type: Date,
    required: true,
    index: { expireAfterSeconds: 0 }
  }
}, {
  collection: 'otp',
  timestamps: { createdAt: true, updatedAt: false }
});

passcodeSchema.index({ email: 1, code: 1 });

export const purgeDateFor = (expiresAt: number): Date =>
  new Date((expiresAt + PURGE_GRACE_SECONDS) * 1000);

const Passcode = mongoose.model<IPasscode>('Passcode', passcodeSchema);
export default Passcode;
