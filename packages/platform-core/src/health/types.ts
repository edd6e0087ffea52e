/**
 * Health Check Types
 */

export interface ComponentHealth {
  status: 'healthy' | 'unhealthy';
  responseTimeMs?: number;
  errorMessage?: string;
}

export interface LivenessResponse {
  alive: boolean;
  service: string;
  timestamp: string;
  uptime: number;
}

export interface ReadinessResponse {
  ready: boolean;
  service: string;
  timestamp: string;
  uptime: number;
  components: Record<string, ComponentHealth>;
}

export type HealthCheck = () => Promise<void>;

export interface HealthRouterConfig {
  serviceName: string;
  /** Named readiness checks; a check passes when its promise resolves */
  checks?: Record<string, HealthCheck>;
}
