import mongoose, { Schema, Document } from 'mongoose';
import { generateId } from '../utils/crypto';
import type { AppStatus } from '../stores/types';

export type DeploymentSource = 'github' | 'docker' | 'python_script';

export interface IApp extends Document<string> {
  _id: string;
  userId: string;
  name: string;
  description?: string;
  status: AppStatus;
  sourceType: DeploymentSource;
  sourceConfig: Record<string, unknown>;
  envVars: Record<string, string>;
  url: string;
  createdAt: Date;
  updatedAt: Date;
}

const AppSchema = new Schema<IApp>(
  {
    _id: { type: String, default: generateId },
    userId: { type: String, ref: 'User', required: true },
    name: { type: String, required: true, lowercase: true, trim: true },
    description: { type: String },
    status: {
      type: String,
      enum: ['pending', 'deploying', 'running', 'stopped', 'failed'],
      default: 'pending',
    },
    sourceType: { type: String, enum: ['github', 'docker', 'python_script'], required: true },
    sourceConfig: { type: Schema.Types.Mixed, default: {} },
    envVars: { type: Schema.Types.Mixed, default: {} },
    url: { type: String, default: '' },
  },
  { timestamps: true, minimize: false }
);

AppSchema.index({ userId: 1, name: 1 }, { unique: true });
AppSchema.index({ userId: 1 });

export const App = mongoose.model<IApp>('App', AppSchema);
