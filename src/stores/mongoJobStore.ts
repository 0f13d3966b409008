import type { UpdateQuery } from 'mongoose';
import { App } from '../models/App';
import { Deployment, IDeployment } from '../models/Deployment';
import type {
  AppRecord,
  AppStatus,
  DeploymentPatch,
  DeploymentRecord,
  DeploymentStore,
  NewDeployment,
} from './types';

function toDeploymentRecord(deployment: IDeployment): DeploymentRecord {
  return {
    id:          deployment._id,
    appId:       deployment.appId,
    userId:      deployment.userId,
    status:      deployment.status,
    commitSha:   deployment.commitSha,
    dockerImage: deployment.dockerImage,
    logs:        [...deployment.logs],
    createdAt:   deployment.createdAt,
    completedAt: deployment.completedAt,
  };
}

/** One update document: field sets plus an optional log append. */
export function buildDeploymentUpdate(patch: DeploymentPatch): UpdateQuery<IDeployment> {
  const set: Record<string, unknown> = {};
  if (patch.status !== undefined) set.status = patch.status;
  if (patch.completedAt !== undefined) set.completedAt = patch.completedAt;

  const update: UpdateQuery<IDeployment> = {};
  if (Object.keys(set).length > 0) update.$set = set;
  if (patch.appendLog !== undefined) update.$push = { logs: patch.appendLog };
  return update;
}

/**
 * Job store backed by the `deployments` and `apps` collections.
 */
export class MongoJobStore implements DeploymentStore {
  async findDeployment(id: string): Promise<DeploymentRecord | null> {
    const deployment = await Deployment.findById(id);
    return deployment ? toDeploymentRecord(deployment) : null;
  }

  async findOwnedDeployment(id: string, userId: string): Promise<DeploymentRecord | null> {
    const deployment = await Deployment.findOne({ _id: id, userId });
    return deployment ? toDeploymentRecord(deployment) : null;
  }

  async listDeployments(userId: string, query: { appId?: string; limit: number }): Promise<DeploymentRecord[]> {
    const filter: Record<string, unknown> = { userId };
    if (query.appId) filter.appId = query.appId;

    const deployments = await Deployment.find(filter).sort({ createdAt: -1 }).limit(query.limit);
    return deployments.map(toDeploymentRecord);
  }

  async createDeployment(input: NewDeployment): Promise<DeploymentRecord> {
    const deployment = await Deployment.create({ ...input, status: 'pending' });
    return toDeploymentRecord(deployment);
  }

  async findOwnedApp(appId: string, userId: string): Promise<AppRecord | null> {
    const app = await App.findOne({ _id: appId, userId });
    return app ? { id: app._id, userId: app.userId, name: app.name, status: app.status } : null;
  }

  async updateDeployment(id: string, patch: DeploymentPatch): Promise<void> {
    await Deployment.updateOne({ _id: id }, buildDeploymentUpdate(patch));
  }

  async appendDeploymentLog(id: string, line: string): Promise<void> {
    await Deployment.updateOne({ _id: id }, { $push: { logs: line } });
  }

  async setAppStatus(appId: string, status: AppStatus): Promise<void> {
    await App.updateOne({ _id: appId }, { $set: { status } });
  }
}
