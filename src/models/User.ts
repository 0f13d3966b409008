import mongoose, { Schema, Document } from 'mongoose';
import { generateId } from '../utils/crypto';
import type { UserRole } from '../stores/types';

export interface IApiKey {
  _id: string;
  name: string;
  key: string;
  createdAt: Date;
}

export interface IUser extends Document<string> {
  _id: string;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  apiKeys: IApiKey[];
  createdAt: Date;
  updatedAt: Date;
}

const ApiKeySchema = new Schema<IApiKey>({
  _id: { type: String, default: generateId },
  name: { type: String, required: true },
  key: { type: String, required: true },
  createdAt: { type: Date, default: Date.now },
});

const UserSchema = new Schema<IUser>(
  {
    _id: { type: String, default: generateId },
    username: { type: String, required: true, unique: true, trim: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    passwordHash: { type: String, required: true },
    role: { type: String, enum: ['user', 'admin'], default: 'user' },
    isActive: { type: Boolean, default: true },
    apiKeys: { type: [ApiKeySchema], default: [] },
  },
  { timestamps: true }
);

// API-key authentication looks users up by secret
UserSchema.index({ 'apiKeys.key': 1 }, { sparse: true });

export const User = mongoose.model<IUser>('User', UserSchema);
