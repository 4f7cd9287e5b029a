// ============================================
// Configuration Types
// ============================================

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface LoggingConfig {
  level: string;
  file: string;
  silent: boolean;
}

export interface AuthConfig {
  jwtSecret: string;
  jwtAlgorithm: JwtAlgorithm;
  accessTokenExpireMinutes: number;
  bcryptRounds: number;
}

export interface LlmConfig {
  baseUrl: string;
  model: string;
  probeTimeoutMs: number;
  chatTimeoutMs: number;
  circuitFailureThreshold: number;
  circuitCooldownMs: number;
}

export interface UploadConfig {
  maxBytes: number;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  usersDir: string;
  auth: AuthConfig;
  llm: LlmConfig;
  upload: UploadConfig;
  logging: LoggingConfig;
}
