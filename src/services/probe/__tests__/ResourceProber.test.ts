import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  ResourceProberImpl,
  assertHttpEndpoint,
  healthEndpointFor,
  type HealthHttpClient,
} from '../ResourceProberImpl.js';
import { ValidationError } from '../../../types/errors.js';

describe('ResourceProber', () => {
  let ping: Mock<[], Promise<boolean>>;
  let isAvailable: Mock<[], Promise<boolean>>;
  let get: Mock<[string], Promise<{ status: number }>>;
  let prober: ResourceProberImpl;

  beforeEach(() => {
    ping = vi.fn<[], Promise<boolean>>().mockResolvedValue(true);
    isAvailable = vi.fn<[], Promise<boolean>>().mockResolvedValue(true);
    get = vi
      .fn<[string], Promise<{ status: number }>>()
      .mockResolvedValue({ status: 200 });
    const http: HealthHttpClient = { get };
    prober = new ResourceProberImpl({ ping }, { isAvailable }, { http });
  });

  describe('isDatabaseServerReady', () => {
    it('should return the ping answer', async () => {
      expect(await prober.isDatabaseServerReady()).toBe(true);

      ping.mockResolvedValueOnce(false);
      expect(await prober.isDatabaseServerReady()).toBe(false);
    });

    it('should turn a thrown error into false', async () => {
      ping.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      expect(await prober.isDatabaseServerReady()).toBe(false);
    });
  });

  describe('isServiceHealthy', () => {
    it('should be healthy on a 2xx response', async () => {
      get.mockResolvedValueOnce({ status: 204 });

      expect(await prober.isServiceHealthy('http://localhost:8000/health')).toBe(
        true
      );
      expect(get).toHaveBeenCalledWith('http://localhost:8000/health');
    });

    it.each([301, 404, 500, 503])(
      'should treat status %i as unhealthy',
      async (status) => {
        get.mockResolvedValueOnce({ status });

        expect(
          await prober.isServiceHealthy('http://localhost:8000/health')
        ).toBe(false);
      }
    );

    it('should treat a transport error as unhealthy', async () => {
      get.mockRejectedValueOnce(new Error('socket hang up'));

      expect(await prober.isServiceHealthy('http://localhost:8000/health')).toBe(
        false
      );
    });

    it('should throw for a malformed endpoint without calling it', async () => {
      await expect(prober.isServiceHealthy('localhost:8000')).rejects.toThrow(
        ValidationError
      );
      await expect(prober.isServiceHealthy('not a url')).rejects.toThrow(
        'Health endpoint must be an absolute URL'
      );
      expect(get).not.toHaveBeenCalled();
    });
  });

  describe('isContainerRuntimeAvailable', () => {
    it('should report the runtime answer', async () => {
      expect(await prober.isContainerRuntimeAvailable()).toBe(true);

      isAvailable.mockRejectedValueOnce(new Error('spawn docker ENOENT'));
      expect(await prober.isContainerRuntimeAvailable()).toBe(false);
    });
  });

  describe('assertHttpEndpoint', () => {
    it('should reject non-http schemes', () => {
      expect(() => assertHttpEndpoint('ftp://example.com/health')).toThrow(
        'Health endpoint must use http or https'
      );
      expect(() => assertHttpEndpoint('https://example.com/health')).not.toThrow();
    });
  });

  describe('healthEndpointFor', () => {
    it('should substitute the tenant name', () => {
      expect(healthEndpointFor('http://{tenant}.internal:8000/health', 'acme')).toBe(
        'http://acme.internal:8000/health'
      );
      expect(healthEndpointFor('http://localhost:8000/health', 'acme')).toBe(
        'http://localhost:8000/health'
      );
    });
  });
});
