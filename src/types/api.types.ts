/**
 * API request and response types
 */

// Success response wrapper
export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
}

// List response wrapper
export interface ApiListResponse<T> {
  data: T[];
  meta: {
    count: number;
  };
}

// Error response wrapper
export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  store: {
    driver: string;
    reachable: boolean;
  };
  uptime: number;
}
