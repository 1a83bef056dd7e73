/**
 * One rollback snapshot per tenant, kept beside the deployment directory
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { SnapshotError, errorMessage } from '../types/errors.js';
import logger from '../utils/logger.js';
import {
  ENV_FILE_NAME,
  SNAPSHOT_META_FILE_NAME,
  tenantLayout,
  type TenantLayout,
} from './layout.js';
import {
  ReleaseManifestSchema,
  readReleaseManifest,
  type ReleaseManifest,
} from './releaseManifest.js';

const SnapshotMetadataSchema = z.object({
  tenant: z.string().min(1),
  timestamp: z.string().datetime(),
  hasEnvironment: z.boolean(),
  release: ReleaseManifestSchema.nullable(),
});

type SnapshotMetadata = z.infer<typeof SnapshotMetadataSchema>;

/**
 * A point-in-time copy of the previous working deployment
 */
export interface DeploymentSnapshot {
  tenant: string;
  timestamp: string;
  /** Copy of the deployment directory */
  sourceDirectoryCopy: string;
  /** Copy of the generated environment file, when there was one */
  environmentCopy: string | null;
  /** Release marker of the captured deployment */
  release: ReleaseManifest | null;
}

export class SnapshotStore {
  constructor(
    private readonly stateDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  layout(tenant: string): TenantLayout {
    return tenantLayout(this.stateDir, tenant);
  }

  /**
   * Replace the tenant's snapshot with a copy of the current deployment.
   * Without a current deployment any stale snapshot is removed.
   * @returns null when there was nothing to capture
   */
  async capture(tenant: string): Promise<DeploymentSnapshot | null> {
    const layout = this.layout(tenant);

    try {
      if (!(await fs.pathExists(layout.currentDir))) {
        await fs.remove(layout.snapshotDir);
        logger.info('No current deployment to snapshot', { tenant });
        return null;
      }

      // Assemble next to the old snapshot so a crash never leaves a half copy
      // in its place
      const staging = layout.snapshotStagingDir;
      await fs.remove(staging);
      await fs.copy(layout.currentDir, path.join(staging, 'deployment'));

      const hasEnvironment = await fs.pathExists(layout.envFile);
      if (hasEnvironment) {
        await fs.copy(layout.envFile, path.join(staging, ENV_FILE_NAME));
      }

      const metadata: SnapshotMetadata = {
        tenant,
        timestamp: this.now().toISOString(),
        hasEnvironment,
        release: await readReleaseManifest(layout.releaseFile),
      };
      await fs.outputJson(path.join(staging, SNAPSHOT_META_FILE_NAME), metadata, {
        spaces: 2,
      });

      await fs.remove(layout.snapshotDir);
      await fs.move(staging, layout.snapshotDir);

      logger.info('Captured deployment snapshot', {
        tenant,
        image: metadata.release?.image,
      });
      return this.toSnapshot(layout, metadata);
    } catch (error) {
      throw new SnapshotError(
        `Failed to capture snapshot: ${errorMessage(error)}`,
        { tenant },
        error
      );
    }
  }

  /**
   * @returns null when the tenant has no snapshot
   */
  async load(tenant: string): Promise<DeploymentSnapshot | null> {
    const layout = this.layout(tenant);
    if (!(await fs.pathExists(layout.snapshotMetaFile))) {
      return null;
    }

    const raw: unknown = await fs.readJson(layout.snapshotMetaFile);
    const parsed = SnapshotMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotError('Snapshot metadata is invalid', {
        tenant,
        file: layout.snapshotMetaFile,
      });
    }
    return this.toSnapshot(layout, parsed.data);
  }

  /**
   * Put the snapshot back as the current deployment and delete it
   */
  async restore(tenant: string): Promise<DeploymentSnapshot> {
    const snapshot = await this.load(tenant);
    if (!snapshot) {
      throw new SnapshotError('No snapshot to restore', { tenant });
    }

    const layout = this.layout(tenant);
    try {
      await fs.remove(layout.currentDir);
      await fs.move(layout.snapshotDeploymentDir, layout.currentDir);
      if (snapshot.environmentCopy) {
        await fs.copy(snapshot.environmentCopy, layout.envFile, {
          overwrite: true,
        });
      }
      await fs.remove(layout.snapshotDir);
    } catch (error) {
      throw new SnapshotError(
        `Failed to restore snapshot: ${errorMessage(error)}`,
        { tenant },
        error
      );
    }

    logger.info('Restored deployment snapshot', {
      tenant,
      image: snapshot.release?.image,
      timestamp: snapshot.timestamp,
    });
    return snapshot;
  }

  private toSnapshot(
    layout: TenantLayout,
    metadata: SnapshotMetadata
  ): DeploymentSnapshot {
    return {
      tenant: metadata.tenant,
      timestamp: metadata.timestamp,
      sourceDirectoryCopy: layout.snapshotDeploymentDir,
      environmentCopy: metadata.hasEnvironment ? layout.snapshotEnvFile : null,
      release: metadata.release,
    };
  }
}
