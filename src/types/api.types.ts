/**
 * API request and response types
 */

// Success response wrapper
export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
  meta?: Record<string, unknown>;
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
  store: 'memory' | 'supabase';
  uptime: number;
}
