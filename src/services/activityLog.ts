import { Log, LogLevel, LogType } from '../models/Log';

interface ActivityParams {
  appId?: string;
  deploymentId?: string;
  functionId?: string;
  logType: LogType;
  message: string;
  level?: LogLevel;
}

/**
 * Append a platform log entry (readable through GET /logs). Failures are
 * reported but never fail the request that produced the entry.
 */
export async function recordActivity(params: ActivityParams): Promise<void> {
  try {
    await Log.create({
      appId: params.appId,
      deploymentId: params.deploymentId,
      functionId: params.functionId,
      logType: params.logType,
      message: params.message,
      level: params.level ?? 'info',
    });
  } catch (err) {
    console.error('[ActivityLog] Failed to write log entry:', err);
  }
}
