import type { IApp } from '../models/App';
import type { IFunction } from '../models/Function';
import type { ILog } from '../models/Log';
import type { DeploymentRecord, UserRecord } from '../stores/types';

export function publicUser(user: UserRecord) {
  return {
    id:        user.id,
    username:  user.username,
    email:     user.email,
    role:      user.role,
    isActive:  user.isActive,
    createdAt: user.createdAt,
  };
}

export function publicApp(app: IApp) {
  return {
    id:           app._id,
    name:         app.name,
    description:  app.description ?? null,
    userId:       app.userId,
    status:       app.status,
    sourceType:   app.sourceType,
    sourceConfig: app.sourceConfig,
    envVars:      app.envVars,
    url:          app.url,
    createdAt:    app.createdAt,
    updatedAt:    app.updatedAt,
  };
}

export function publicDeployment(deployment: DeploymentRecord) {
  return {
    id:          deployment.id,
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

// Source code is not echoed back
export function publicFunction(fn: IFunction) {
  return {
    id:        fn._id,
    name:      fn.name,
    userId:    fn.userId,
    runtime:   fn.runtime,
    handler:   fn.handler,
    envVars:   fn.envVars,
    timeout:   fn.timeout,
    endpoint:  fn.endpoint,
    createdAt: fn.createdAt,
    updatedAt: fn.updatedAt,
  };
}

export function publicLog(log: ILog) {
  return {
    id:           log._id,
    appId:        log.appId ?? null,
    deploymentId: log.deploymentId ?? null,
    functionId:   log.functionId ?? null,
    logType:      log.logType,
    message:      log.message,
    level:        log.level,
    createdAt:    log.createdAt,
  };
}
