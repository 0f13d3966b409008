import mongoose, { Schema, Document } from 'mongoose';
import { generateId } from '../utils/crypto';

export type FunctionRuntime = 'python' | 'nodejs';

export interface IFunction extends Document<string> {
  _id: string;
  userId: string;
  name: string;
  runtime: FunctionRuntime;
  code: string;
  handler: string;
  envVars: Record<string, string>;
  timeout: number; // seconds
  endpoint: string;
  createdAt: Date;
  updatedAt: Date;
}

const FunctionSchema = new Schema<IFunction>(
  {
    _id: { type: String, default: generateId },
    userId: { type: String, ref: 'User', required: true },
    name: { type: String, required: true, trim: true },
    runtime: { type: String, enum: ['python', 'nodejs'], required: true },
    code: { type: String, required: true },
    handler: { type: String, default: 'main' },
    envVars: { type: Schema.Types.Mixed, default: {} },
    timeout: { type: Number, default: 30, min: 1, max: 300 },
    endpoint: { type: String, default: '' },
  },
  { timestamps: true, minimize: false }
);

FunctionSchema.index({ userId: 1, name: 1 }, { unique: true });

export const CloudFunction = mongoose.model<IFunction>('Function', FunctionSchema);
