export type {
  ProvisioningResult,
  TenantProvisioner,
} from './TenantProvisioner.js';
export {
  TenantProvisionerImpl,
  type SharedServerOptions,
} from './TenantProvisionerImpl.js';
