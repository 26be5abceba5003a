// src/services/message.service.ts
import { Message } from '../models/Message';
import { ServiceUnavailableError } from '../utils/errors';

export interface ChatMessage {
  from_email: string;
  to_email: string;
  content: string;
  read: boolean;
  created_at: Date;
}

export interface MessageRepository {
  send(from: string, to: string, content: string): Promise<ChatMessage>;
  /** Both directions between a and b, oldest first. */
  history(a: string, b: string): Promise<ChatMessage[]>;
  /** Remove everything the email sent or received. */
  removeFor(email: string): Promise<number>;
}

const toChatMessage = (doc: ChatMessage): ChatMessage => ({
  from_email: doc.from_email,
  to_email: doc.to_email,
  content: doc.content,
  read: doc.read,
  created_at: doc.created_at,
});

export class MongoMessageRepository implements MessageRepository {
  async send(from: string, to: string, content: string): Promise<ChatMessage> {
    try {
      const doc = await Message.create({ from_email: from, to_email: to, content });
      return toChatMessage(doc);
    } catch (err) {
      console.error('Error sending message:', err);
      throw new ServiceUnavailableError('Database not available');
    }
  }

  async history(a: string, b: string): Promise<ChatMessage[]> {
    try {
      const docs = await Message.find({
        $or: [
          { from_email: a, to_email: b },
          { from_email: b, to_email: a }
        ]
      }).sort({ created_at: 1 }).lean();
      return docs.map(toChatMessage);
    } catch (err) {
      console.error('Error fetching chat history:', err);
      throw new ServiceUnavailableError('Database not available');
    }
  }

  async removeFor(email: string): Promise<number> {
    try {
      const result = await Message.deleteMany({ $or: [{ from_email: email }, { to_email: email }] });
      return result.deletedCount;
    } catch (err) {
      console.error('Error deleting messages:', err);
      throw new ServiceUnavailableError('Database not available');
    }
  }
}
