export type { ResourceProber } from './ResourceProber.js';
export {
  ResourceProberImpl,
  assertHttpEndpoint,
  healthEndpointFor,
  type HealthHttpClient,
  type ResourceProberOptions,
} from './ResourceProberImpl.js';
