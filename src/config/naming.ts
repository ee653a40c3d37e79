import { EnvironmentName } from '../types/index.js';

/**
 * Inputs for naming a deployed service and its image
 */
export interface NamingConfig {
  /** Base service name shared by every environment */
  serviceBaseName: string;
  /** Target environment */
  environment: EnvironmentName;
  /** Container registry host, e.g. gcr.io */
  registry: string;
  /** Cloud project that owns the registry namespace */
  projectId: string;
}

/**
 * Generated names for one environment
 */
export interface ResourceNames {
  /** Cloud Run service name */
  serviceName: string;
  /** Untagged image reference */
  imageReference: string;
}

/** Environment that keeps the bare base name. */
const UNQUALIFIED_ENVIRONMENT: EnvironmentName = 'production';

export const DEFAULT_IMAGE_TAG = 'latest';

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  // Cloud Run service names are limited to 49 characters
  private readonly maxServiceNameLength = 49;

  /**
   * Generate the service name and image reference for an environment
   */
  generateResourceNames(config: NamingConfig): ResourceNames {
    const serviceName = this.generateServiceName(config.serviceBaseName, config.environment);
    return {
      serviceName,
      imageReference: this.generateImageReference(config.registry, config.projectId, serviceName)
    };
  }

  /**
   * Qualify the base name with the environment. Production keeps the bare
   * name; every other environment gets a `-<environment>` suffix that
   * survives truncation.
   */
  generateServiceName(serviceBaseName: string, environment: EnvironmentName): string {
    const suffix = environment === UNQUALIFIED_ENVIRONMENT ? '' : `-${environment}`;
    const base = this.sanitizeName(serviceBaseName);
    return this.validateAndTruncate(base, this.maxServiceNameLength - suffix.length) + suffix;
  }

  generateImageReference(registry: string, projectId: string, serviceName: string): string {
    const host = registry.replace(/\/+$/, '');
    return `${host}/${projectId}/${serviceName}`;
  }

  /**
   * Append a tag to an untagged image reference
   */
  tagImage(imageReference: string, tag: string = DEFAULT_IMAGE_TAG): string {
    return `${imageReference}:${tag}`;
  }

  /**
   * Sanitize name to be a valid Cloud Run service name
   * - Lowercase letters, digits and hyphens only
   * - Starts with a letter, no trailing hyphen
   */
  private sanitizeName(name: string): string {
    let sanitized = name.toLowerCase().replace(/[^a-z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-z]/.test(sanitized)) {
      sanitized = 'svc-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'service';
    }

    return sanitized;
  }

  /**
   * Truncate a name to fit the length limit, keeping it unique with a short hash
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1; // -1 for hyphen
    const truncated = name.substring(0, truncatedLength).replace(/-+$/, '');

    return `${truncated}-${hash}`;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
