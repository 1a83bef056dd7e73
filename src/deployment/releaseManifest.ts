/**
 * release.json: which image a deployment directory runs and which attempt
 * wrote it. Rollback checks are made against this marker.
 */

import fs from 'fs-extra';
import { z } from 'zod';

export const ReleaseManifestSchema = z.object({
  tenant: z.string().min(1),
  image: z.string().min(1),
  mode: z.enum(['production', 'staging']),
  attemptId: z.string().uuid(),
  deployedAt: z.string().datetime(),
});

export type ReleaseManifest = z.infer<typeof ReleaseManifestSchema>;

export async function writeReleaseManifest(
  file: string,
  manifest: ReleaseManifest
): Promise<void> {
  await fs.outputJson(file, manifest, { spaces: 2 });
}

/**
 * @returns null when the file does not exist
 * @throws Error when the file exists but is not a valid manifest
 */
export async function readReleaseManifest(
  file: string
): Promise<ReleaseManifest | null> {
  if (!(await fs.pathExists(file))) {
    return null;
  }

  const raw: unknown = await fs.readJson(file);
  const parsed = ReleaseManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid release manifest at ${file}`);
  }
  return parsed.data;
}
