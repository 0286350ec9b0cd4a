export interface QueueConfig {
  maxAttempts: number;
  retryBaseDelayMs: number;
  pollIntervalMs: number;
  taskTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  siteUrl: string;
  auth: {
    jwtSecret: string;
    jwtExpiresInSeconds: number;
    bcryptRounds: number;
    resetTokenTtlMinutes: number;
  };
  mail: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    pass?: string;
    from: string;
  };
  social: {
    apiBaseUrl: string;
  };
  queue: QueueConfig;
  uploads: {
    maxFileSize: number;
  };
}

const toInt = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: toInt(env, 'PORT', 3000),
  siteUrl: (env.SITE_URL || 'http://localhost:3000').replace(/\/+$/, ''),
  auth: {
    jwtSecret: env.JWT_SECRET || 'dev-secret',
    jwtExpiresInSeconds: toInt(env, 'JWT_EXPIRES_IN_SECONDS', 24 * 60 * 60),
    bcryptRounds: toInt(env, 'BCRYPT_ROUNDS', 10),
    resetTokenTtlMinutes: toInt(env, 'RESET_TOKEN_TTL_MINUTES', 15)
  },
  mail: {
    host: env.SMTP_HOST || 'localhost',
    port: toInt(env, 'SMTP_PORT', 587),
    secure: env.SMTP_SECURE === 'true',
    user: env.SMTP_USER || undefined,
    pass: env.SMTP_PASS || undefined,
    from: env.MAIL_FROM || 'newsroom@example.com'
  },
  social: {
    apiBaseUrl: (env.SOCIAL_API_URL || 'https://api.x.com/2').replace(/\/+$/, '')
  },
  queue: {
    maxAttempts: toInt(env, 'TASK_MAX_ATTEMPTS', 3),
    retryBaseDelayMs: toInt(env, 'TASK_RETRY_BASE_MS', 1000),
    pollIntervalMs: toInt(env, 'TASK_POLL_MS', 100),
    taskTimeoutMs: toInt(env, 'TASK_TIMEOUT_MS', 10000)
  },
  uploads: {
    maxFileSize: toInt(env, 'UPLOAD_MAX_BYTES', 5 * 1024 * 1024)
  }
});
