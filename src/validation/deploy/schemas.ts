/**
 * Zod validation schemas for deployment requests
 */

import { z } from 'zod';
import { RESERVED_ENV_KEYS } from '../../deployment/environmentFile.js';

/**
 * Validation schema for the tenant name
 * - Lowercase letters, numbers and single hyphens
 * - Starts with a letter so derived SQL identifiers stay plain
 * - Between 3 and 40 characters, which keeps `<name>_network` under the
 *   PostgreSQL identifier limit
 */
export const TenantNameSchema = z
  .string({ required_error: 'Tenant name is required' })
  .min(3, 'Tenant name must be at least 3 characters long')
  .max(40, 'Tenant name must not exceed 40 characters')
  .regex(
    /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/,
    'Tenant name must start with a letter and contain only lowercase letters, numbers, and hyphens (cannot end with a hyphen)'
  );

/**
 * The credential is opaque; it only has to be present and not blank
 */
export const CredentialSecretSchema = z
  .string({ required_error: 'Credential is required' })
  .min(1, 'Credential is required')
  .refine((value) => value.trim().length > 0, 'Credential must not be blank')
  .refine((value) => !/[\r\n]/.test(value), 'Credential must be a single line');

export const ImageReferenceSchema = z
  .string({ required_error: 'Image reference is required' })
  .min(1, 'Image reference is required')
  .regex(/^\S+$/, 'Image reference must not contain whitespace');

export const DeploymentModeSchema = z.enum(['production', 'staging'], {
  required_error: 'Deployment mode is required',
});

const FeatureAssignmentSchema = z
  .string()
  .regex(
    /^[A-Z][A-Z0-9_]*=[^\r\n]*$/,
    'Feature toggles must look like KEY=VALUE with an upper-case key'
  );

const reservedKeys: readonly string[] = RESERVED_ENV_KEYS;

/**
 * Feature toggles arrive as KEY=VALUE strings and leave as a record
 */
export const FeatureTogglesSchema = z
  .array(FeatureAssignmentSchema)
  .default([])
  .transform((assignments, ctx) => {
    const features: Record<string, string> = {};
    for (const assignment of assignments) {
      const eqIndex = assignment.indexOf('=');
      const key = assignment.substring(0, eqIndex);
      if (reservedKeys.includes(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Feature toggle ${key} would override a generated setting`,
        });
        return z.NEVER;
      }
      features[key] = assignment.substring(eqIndex + 1);
    }
    return features;
  });

export const HealthUrlSchema = z
  .string()
  .url('Health URL must be an absolute URL')
  .refine(
    (value) => /^https?:\/\//i.test(value),
    'Health URL must use http or https'
  );

/**
 * Schema for one deployment invocation
 */
export const DeployRequestSchema = z.object({
  tenant: TenantNameSchema,
  credentialSecret: CredentialSecretSchema,
  image: ImageReferenceSchema,
  mode: DeploymentModeSchema,
  bundleDir: z.string().min(1).optional(),
  healthUrl: HealthUrlSchema.optional(),
  features: FeatureTogglesSchema,
  prune: z.boolean().default(false),
});

/**
 * Raw arguments of one deployment, as given on the command line
 */
export interface DeployArguments {
  tenant: string;
  credentialSecret?: string;
  image?: string;
  mode?: string;
  bundleDir?: string;
  healthUrl?: string;
  features?: string[];
  prune?: boolean;
}

/**
 * Validated and transformed request
 */
export type DeployRequest = z.infer<typeof DeployRequestSchema>;

/**
 * Validate a deployment request
 * @throws ZodError if validation fails
 */
export function validateDeployRequest(data: unknown): DeployRequest {
  return DeployRequestSchema.parse(data);
}

/**
 * Tenant and credential, for commands that touch only the database
 */
export const TenantIdentityRequestSchema = DeployRequestSchema.pick({
  tenant: true,
  credentialSecret: true,
});

export type TenantIdentityRequest = z.infer<typeof TenantIdentityRequestSchema>;

/**
 * @throws ZodError if validation fails
 */
export function validateTenantIdentityRequest(
  data: unknown
): TenantIdentityRequest {
  return TenantIdentityRequestSchema.parse(data);
}

/**
 * Format Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return issues.join('; ');
}
