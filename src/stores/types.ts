export type UserRole = 'user' | 'admin';

export type AppStatus = 'pending' | 'deploying' | 'running' | 'stopped' | 'failed';

export type DeploymentStatus = 'pending' | 'deploying' | 'running' | 'failed';

export type TerminalDeploymentStatus = Extract<DeploymentStatus, 'running' | 'failed'>;

export interface ApiKeyRecord {
  id: string;
  name: string;
  key: string;
  createdAt: Date;
}

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  apiKeys: ApiKeyRecord[];
  createdAt: Date;
  updatedAt: Date;
}

export interface AppRecord {
  id: string;
  userId: string;
  name: string;
  status: AppStatus;
}

export interface DeploymentRecord {
  id: string;
  appId: string;
  userId: string;
  status: DeploymentStatus;
  commitSha: string | null;
  dockerImage: string | null;
  logs: string[];
  createdAt: Date;
  completedAt: Date | null;
}

/**
 * Point lookups and nested API-key list mutations over user records.
 */
export interface CredentialStore {
  findUserById(id: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  /** Exact match on one of the user's embedded API key secrets. */
  findUserByApiKey(key: string): Promise<UserRecord | null>;
  /** Resolves false when no user with that id exists. */
  pushApiKey(userId: string, apiKey: ApiKeyRecord): Promise<boolean>;
  /** Resolves false when nothing was removed. */
  pullApiKey(userId: string, keyId: string): Promise<boolean>;
}

export interface DeploymentPatch {
  status?: DeploymentStatus;
  completedAt?: Date;
  appendLog?: string;
}

/**
 * Field-set updates on deployment and application records. Each call is
 * applied as a single document update.
 */
export interface JobStore {
  findDeployment(id: string): Promise<DeploymentRecord | null>;
  updateDeployment(id: string, patch: DeploymentPatch): Promise<void>;
  appendDeploymentLog(id: string, line: string): Promise<void>;
  setAppStatus(appId: string, status: AppStatus): Promise<void>;
}

export interface NewDeployment {
  appId: string;
  userId: string;
  commitSha: string | null;
  dockerImage: string | null;
}

/**
 * Owner-scoped reads and creation behind the deployment routes. A record that
 * belongs to another user is reported as missing.
 */
export interface DeploymentStore extends JobStore {
  findOwnedApp(appId: string, userId: string): Promise<AppRecord | null>;
  findOwnedDeployment(id: string, userId: string): Promise<DeploymentRecord | null>;
  /** Newest first. */
  listDeployments(userId: string, query: { appId?: string; limit: number }): Promise<DeploymentRecord[]>;
  /** Persists a `pending` deployment with the initial log line. */
  createDeployment(input: NewDeployment): Promise<DeploymentRecord>;
}
