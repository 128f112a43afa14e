// Loaded before anything that pulls in the logger.
process.env.LOG_TO_FILE = 'false';
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'fatal';
