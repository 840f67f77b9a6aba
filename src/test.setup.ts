// Keep test output quiet and the logger on plain JSON (no pino-pretty worker).
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
