/**
 * The key/value environment file consumed by a started tenant service.
 * It is regenerated from scratch on every deployment attempt.
 */

import fs from 'fs-extra';
import type { DeploymentMode } from '../types/tenant.js';

/**
 * Keys the orchestrator owns; feature toggles may not override them
 */
export const RESERVED_ENV_KEYS = [
  'TENANT_NAME',
  'ENVIRONMENT',
  'SERVICE_IMAGE',
  'TENANT_NETWORK',
  'DATABASE_URL',
  'DB_USER',
  'DB_PASSWORD',
  'DEBUG',
  'LOG_LEVEL',
] as const;

export interface EnvironmentFileInput {
  tenant: string;
  mode: DeploymentMode;
  image: string;
  /** Compose network the tenant's services join */
  networkName: string;
  databaseUrl: string;
  databaseUser: string;
  credentialSecret: string;
  features: Record<string, string>;
  generatedAt: Date;
}

/**
 * Compose interpolates `$` in unquoted and double-quoted values; `$$` is
 * its escape for a literal dollar sign.
 */
function formatValue(value: string): string {
  const escaped = value.replace(/\$/g, '$$$$');
  if (/[\s#"'\\]/.test(value)) {
    return `"${escaped.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
  }
  return escaped;
}

export function renderEnvironmentFile(input: EnvironmentFileInput): string {
  const entries: Array<[string, string]> = [
    ['TENANT_NAME', input.tenant],
    ['ENVIRONMENT', input.mode],
    ['SERVICE_IMAGE', input.image],
    ['TENANT_NETWORK', input.networkName],
    ['DATABASE_URL', input.databaseUrl],
    ['DB_USER', input.databaseUser],
    ['DB_PASSWORD', input.credentialSecret],
    ['DEBUG', 'false'],
    ['LOG_LEVEL', input.mode === 'production' ? 'INFO' : 'DEBUG'],
  ];

  const featureKeys = Object.keys(input.features).sort();
  for (const key of featureKeys) {
    entries.push([key, input.features[key] ?? '']);
  }

  const lines = [
    `# Generated for tenant ${input.tenant} at ${input.generatedAt.toISOString()}`,
    '# Rewritten on every deployment; local edits are lost.',
    ...entries.map(([key, value]) => `${key}=${formatValue(value)}`),
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Parse KEY=VALUE lines, skipping comments and blank lines and unquoting
 * values written by renderEnvironmentFile.
 */
export function parseEnvironmentFile(content: string): Record<string, string> {
  const env: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex <= 0) continue;

    const key = trimmed.substring(0, eqIndex).trim();
    let value = trimmed.substring(eqIndex + 1).trim();

    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value
        .slice(1, -1)
        .replace(/\\"/g, '"')
        .replace(/\\\\/g, '\\')
        .replace(/\$\$/g, '$');
    } else if (
      value.length >= 2 &&
      value.startsWith("'") &&
      value.endsWith("'")
    ) {
      value = value.slice(1, -1);
    } else {
      value = value.replace(/\$\$/g, '$');
    }

    env[key] = value;
  }

  return env;
}

export async function writeEnvironmentFile(
  path: string,
  content: string
): Promise<void> {
  await fs.outputFile(path, content, { mode: 0o600 });
  // outputFile keeps the mode of an existing file
  await fs.chmod(path, 0o600);
}

export async function readEnvironmentFile(
  path: string
): Promise<Record<string, string> | null> {
  if (!(await fs.pathExists(path))) return null;
  return parseEnvironmentFile(await fs.readFile(path, 'utf8'));
}
