import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceNamingService, createNamingService } from '../naming.js';

describe('Resource Naming Service', () => {
  let namingService: ResourceNamingService;

  beforeEach(() => {
    namingService = new ResourceNamingService();
  });

  describe('generateResourceNames', () => {
    it('should qualify the staging service name and derive the image reference', () => {
      const names = namingService.generateResourceNames({
        serviceBaseName: 'merchant-onboarding-api',
        environment: 'staging',
        registry: 'gcr.io',
        projectId: 'merchant-onboarding'
      });

      expect(names).toEqual({
        serviceName: 'merchant-onboarding-api-staging',
        imageReference: 'gcr.io/merchant-onboarding/merchant-onboarding-api-staging'
      });
    });

    it('should keep the bare name for production', () => {
      const names = namingService.generateResourceNames({
        serviceBaseName: 'merchant-onboarding-api',
        environment: 'production',
        registry: 'us-docker.pkg.dev',
        projectId: 'payments-prod'
      });

      expect(names).toEqual({
        serviceName: 'merchant-onboarding-api',
        imageReference: 'us-docker.pkg.dev/payments-prod/merchant-onboarding-api'
      });
    });
  });

  describe('generateServiceName', () => {
    it('should sanitize invalid characters', () => {
      expect(namingService.generateServiceName('My_Service', 'production')).toBe('my-service');
    });

    it('should collapse repeated and edge hyphens', () => {
      expect(namingService.generateServiceName('--orders__api--', 'staging')).toBe('orders-api-staging');
    });

    it('should prefix names that do not start with a letter', () => {
      expect(namingService.generateServiceName('9lives', 'production')).toBe('svc-9lives');
    });

    it('should fall back to a generic name when nothing is left', () => {
      expect(namingService.generateServiceName('___', 'production')).toBe('service');
    });

    it('should truncate long names but keep the environment suffix', () => {
      const name = namingService.generateServiceName('a'.repeat(60), 'staging');

      expect(name).toHaveLength(49);
      expect(name.endsWith('-staging')).toBe(true);
      expect(name).toMatch(/^a+-[a-z0-9]+-staging$/);
    });

    it('should produce the same truncated name for the same input', () => {
      const base = 'very-long-service-name-that-exceeds-the-cloud-run-limit';

      expect(namingService.generateServiceName(base, 'production')).toBe(
        namingService.generateServiceName(base, 'production')
      );
    });
  });

  describe('generateImageReference', () => {
    it('should drop a trailing slash from the registry', () => {
      expect(namingService.generateImageReference('gcr.io/', 'demo-project', 'api')).toBe('gcr.io/demo-project/api');
    });
  });

  describe('tagImage', () => {
    it('should tag with latest by default', () => {
      expect(namingService.tagImage('gcr.io/demo-project/api')).toBe('gcr.io/demo-project/api:latest');
    });

    it('should accept an explicit tag', () => {
      expect(namingService.tagImage('gcr.io/demo-project/api', 'v2')).toBe('gcr.io/demo-project/api:v2');
    });
  });

  describe('createNamingService', () => {
    it('should create a new instance', () => {
      expect(createNamingService()).toBeInstanceOf(ResourceNamingService);
    });
  });
});
