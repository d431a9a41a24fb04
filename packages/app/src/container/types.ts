/**
 * Service lifecycle types
 */

/**
 * Base service interface that all long-lived components implement
 */
export interface Service {
  readonly name: string;

  /** Names of services that must be initialized first */
  readonly dependencies: readonly string[];

  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  healthCheck(): HealthStatus;
}

/**
 * Health status for service health checks
 */
export interface HealthStatus {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: Date;
}
