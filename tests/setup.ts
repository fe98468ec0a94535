// Keep log entries in memory for assertions without writing them to stderr
process.env.NODE_ENV = 'production';
process.env.LOG_LEVEL = 'DEBUG';
