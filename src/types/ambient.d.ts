// Environment variables read by the service

declare namespace NodeJS {
  interface ProcessEnv {
    // Environment
    NODE_ENV?: string;
    PORT?: string;

    // Backing store
    DATA_FILE?: string;
    SEED_FILE?: string;

    // CORS
    CORS_ORIGIN?: string;

    // Alerts
    CHILD_AGE_THRESHOLD?: string;

    // Rate limiting
    RATE_LIMIT_MAX?: string;
    RATE_LIMIT_WINDOW_MS?: string;

    // Logging
    LOG_LEVEL?: string;

    // Serverless platforms (file logging is disabled there)
    VERCEL?: string;
    AWS_LAMBDA_FUNCTION_NAME?: string;
    NETLIFY?: string;

    // Set by the test runner
    VITEST?: string;
  }
}
