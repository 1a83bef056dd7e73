/**
 * Resource prober implementation
 */

import axios from 'axios';
import type { ServerCatalogRepository } from '../../repositories/server/index.js';
import type { ContainerRuntime } from '../../runtime/ContainerRuntime.js';
import { ValidationError } from '../../types/errors.js';
import logger from '../../utils/logger.js';
import type { ResourceProber } from './ResourceProber.js';

/**
 * The part of an HTTP client the prober needs
 */
export interface HealthHttpClient {
  get(url: string): Promise<{ status: number }>;
}

export interface ResourceProberOptions {
  /** Per-request timeout of the default HTTP client */
  requestTimeoutMs?: number;
  http?: HealthHttpClient;
}

/**
 * Substitute the tenant name into a health URL template
 */
export function healthEndpointFor(template: string, tenant: string): string {
  return template.replace(/\{tenant\}/g, tenant);
}

export function assertHttpEndpoint(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ValidationError('Health endpoint must be an absolute URL', {
      endpoint,
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError('Health endpoint must use http or https', {
      endpoint,
    });
  }
}

export class ResourceProberImpl implements ResourceProber {
  private readonly http: HealthHttpClient;

  constructor(
    private readonly catalog: Pick<ServerCatalogRepository, 'ping'>,
    private readonly runtime: Pick<ContainerRuntime, 'isAvailable'>,
    options: ResourceProberOptions = {}
  ) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.requestTimeoutMs ?? 5000,
        // Every status is an answer; only 2xx counts as healthy
        validateStatus: () => true,
        maxRedirects: 0,
      });
  }

  async isDatabaseServerReady(): Promise<boolean> {
    try {
      return await this.catalog.ping();
    } catch (error) {
      logger.debug('Database server probe failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async isServiceHealthy(endpoint: string): Promise<boolean> {
    assertHttpEndpoint(endpoint);

    try {
      const response = await this.http.get(endpoint);
      const healthy = response.status >= 200 && response.status < 300;
      if (!healthy) {
        logger.debug('Health endpoint answered with a failure', {
          endpoint,
          status: response.status,
        });
      }
      return healthy;
    } catch (error) {
      logger.debug('Health endpoint unreachable', {
        endpoint,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async isContainerRuntimeAvailable(): Promise<boolean> {
    try {
      return await this.runtime.isAvailable();
    } catch (error) {
      logger.debug('Container runtime probe failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
