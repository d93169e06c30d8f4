// Keep server bootstrap out of Vitest runs and pretty-printing out of test logs.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
