import { User, IUser } from '../models/User';
import type { ApiKeyRecord, CredentialStore, UserRecord } from './types';

export function toUserRecord(user: IUser): UserRecord {
  return {
    id:           user._id,
    username:     user.username,
    email:        user.email,
    passwordHash: user.passwordHash,
    role:         user.role,
    isActive:     user.isActive,
    apiKeys:      user.apiKeys.map((k) => ({
      id:        k._id,
      name:      k.name,
      key:       k.key,
      createdAt: k.createdAt,
    })),
    createdAt:    user.createdAt,
    updatedAt:    user.updatedAt,
  };
}

/**
 * Credential store backed by the `users` collection. API keys live inside the
 * user document, so key add/remove are single-document `$push` / `$pull`.
 */
export class MongoCredentialStore implements CredentialStore {
  async findUserById(id: string): Promise<UserRecord | null> {
    const user = await User.findById(id);
    return user ? toUserRecord(user) : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const user = await User.findOne({ email: email.toLowerCase() });
    return user ? toUserRecord(user) : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const user = await User.findOne({ username });
    return user ? toUserRecord(user) : null;
  }

  async findUserByApiKey(key: string): Promise<UserRecord | null> {
    const user = await User.findOne({ 'apiKeys.key': key });
    return user ? toUserRecord(user) : null;
  }

  async pushApiKey(userId: string, apiKey: ApiKeyRecord): Promise<boolean> {
    const result = await User.updateOne(
      { _id: userId },
      {
        $push: {
          apiKeys: { _id: apiKey.id, name: apiKey.name, key: apiKey.key, createdAt: apiKey.createdAt },
        },
      }
    );
    return result.matchedCount > 0;
  }

  async pullApiKey(userId: string, keyId: string): Promise<boolean> {
    const result = await User.updateOne({ _id: userId }, { $pull: { apiKeys: { _id: keyId } } });
    return result.modifiedCount > 0;
  }
}
