import mongoose from 'mongoose';
import { config } from './index';

export async function connectDatabase(): Promise<void> {
  await mongoose.connect(config.mongodb.uri, { serverSelectionTimeoutMS: 5000 });
  await mongoose.syncIndexes();
  console.log(`[DB] Connected to MongoDB: ${mongoose.connection.name}`);
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
  console.log('[DB] MongoDB connection closed');
}
