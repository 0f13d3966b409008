import mongoose, { Schema, Document } from 'mongoose';
import { generateId } from '../utils/crypto';
import type { DeploymentStatus } from '../stores/types';

export interface IDeployment extends Document<string> {
  _id: string;
  appId: string;
  userId: string;
  status: DeploymentStatus;
  commitSha: string | null;
  dockerImage: string | null;
  logs: string[];
  createdAt: Date;
  completedAt: Date | null;
}

const DeploymentSchema = new Schema<IDeployment>(
  {
    _id:         { type: String, default: generateId },
    appId:       { type: String, ref: 'App',  required: true },
    userId:      { type: String, ref: 'User', required: true },
    status: {
      type:    String,
      enum:    ['pending', 'deploying', 'running', 'failed'],
      default: 'pending',
    },
    commitSha:   { type: String, default: null },
    dockerImage: { type: String, default: null },
    logs:        { type: [String], default: () => ['Deployment initiated'] },
    completedAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// Listing: GET /deployments?appId=x, newest first
DeploymentSchema.index({ userId: 1, appId: 1, createdAt: -1 });
DeploymentSchema.index({ status: 1 });

export const Deployment = mongoose.model<IDeployment>('Deployment', DeploymentSchema);
