// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: string;
  // Vendor whose order links are generated (e.g. amazon.ca, amazon.com)
  VENDOR_DOMAIN: string;
  MEMO_MAX_LENGTH: number;
  MATCH_DAYS_BEFORE: number;
  MATCH_DAYS_AFTER: number;
  AMOUNT_TOLERANCE_CENTS: number;
  VENDOR_PAYEE_KEYWORDS: string[];
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  details?: ValidationIssue[];
  timestamp: string;
}

// One failed field from request validation
export interface ValidationIssue {
  field: string;
  message: string;
}

// One step of the readiness self-check
export interface ReadinessCheck {
  name: 'parser' | 'matcher' | 'memo';
  ok: boolean;
  detail: string;
}

export interface ReadinessReport {
  ready: boolean;
  checks: ReadinessCheck[];
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  vendorDomain: string;
}
