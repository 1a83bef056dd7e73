import path from 'path';

/**
 * Files and directories kept for one tenant under the state root
 */
export interface TenantLayout {
  root: string;
  /** Deployment directory of the running release */
  currentDir: string;
  envFile: string;
  releaseFile: string;
  snapshotDir: string;
  snapshotDeploymentDir: string;
  snapshotEnvFile: string;
  snapshotMetaFile: string;
  /** Where a snapshot is assembled before it replaces the previous one */
  snapshotStagingDir: string;
}

export const ENV_FILE_NAME = '.env';
export const RELEASE_FILE_NAME = 'release.json';
export const SNAPSHOT_META_FILE_NAME = 'snapshot.json';

export function tenantLayout(stateDir: string, tenant: string): TenantLayout {
  const root = path.join(stateDir, tenant);
  const currentDir = path.join(root, 'current');
  const snapshotDir = path.join(root, 'snapshot');

  return {
    root,
    currentDir,
    envFile: path.join(currentDir, ENV_FILE_NAME),
    releaseFile: path.join(currentDir, RELEASE_FILE_NAME),
    snapshotDir,
    snapshotDeploymentDir: path.join(snapshotDir, 'deployment'),
    snapshotEnvFile: path.join(snapshotDir, ENV_FILE_NAME),
    snapshotMetaFile: path.join(snapshotDir, SNAPSHOT_META_FILE_NAME),
    snapshotStagingDir: path.join(root, 'snapshot.partial'),
  };
}
