// Keep tests off Redis and quiet unless a test raises the level itself
process.env.REDIS_ENABLED = 'false';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'ERROR';
process.env.PROXIES = '';
process.env.PROXY_ROTATION_ENABLED = 'false';
