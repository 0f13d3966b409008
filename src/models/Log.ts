import mongoose, { Schema, Document } from 'mongoose';
import { config } from '../config';
import { generateId } from '../utils/crypto';

export type LogType = 'deployment' | 'runtime' | 'function';
export type LogLevel = 'info' | 'warn' | 'error';

export interface ILog extends Document<string> {
  _id: string;
  appId?: string;
  deploymentId?: string;
  functionId?: string;
  logType: LogType;
  message: string;
  level: LogLevel;
  createdAt: Date;
}

const LogSchema = new Schema<ILog>(
  {
    _id: { type: String, default: generateId },
    appId: { type: String, ref: 'App' },
    deploymentId: { type: String, ref: 'Deployment' },
    functionId: { type: String, ref: 'Function' },
    logType: { type: String, enum: ['deployment', 'runtime', 'function'], required: true },
    message: { type: String, required: true },
    level: { type: String, enum: ['info', 'warn', 'error'], default: 'info' },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

LogSchema.index({ appId: 1, createdAt: -1 });
LogSchema.index({ deploymentId: 1 });
LogSchema.index({ functionId: 1 });

// TTL — retention window from LOGS_RETENTION_DAYS
LogSchema.index(
  { createdAt: 1 },
  { expireAfterSeconds: config.platform.logsRetentionDays * 24 * 60 * 60 }
);

export const Log = mongoose.model<ILog>('Log', LogSchema);
