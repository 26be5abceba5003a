// models/Message.ts
import mongoose, { Schema } from 'mongoose';

export interface IMessage {
  from_email: string;
  to_email: string;
  content: string;
  read: boolean;
  created_at: Date;
  updated_at: Date;
}

const MessageSchema = new Schema<IMessage>({
  from_email: {
    type: String,
    required: true,
    lowercase: true,
    trim: true
  },
  to_email: {
    type: String,
    required: true,
    lowercase: true,
    trim: true
  },
  content: {
    type: String,
    required: true,
    maxlength: 4000
  },
  read: {
    type: Boolean,
    default: false
  }
}, {
  collection: 'message',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' }
});

// Conversation lookups go both ways
MessageSchema.index({ from_email: 1, to_email: 1, created_at: 1 });
MessageSchema.index({ to_email: 1 });

export const Message = mongoose.model<IMessage>('Message', MessageSchema);
