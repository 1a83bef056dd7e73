/**
 * Read-only readiness checks. "Not ready" is an answer, never an exception.
 */

export interface ResourceProber {
  /**
   * Lightweight query against the shared database server
   */
  isDatabaseServerReady(): Promise<boolean>;

  /**
   * One round against the tenant's health endpoint; true only for a 2xx
   * @throws ValidationError if the endpoint is not an absolute http(s) URL
   */
  isServiceHealthy(endpoint: string): Promise<boolean>;

  isContainerRuntimeAvailable(): Promise<boolean>;
}
