// Keep test runs off the rotating log files and quiet on the console.
process.env.LOG_TO_FILE = 'false';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
