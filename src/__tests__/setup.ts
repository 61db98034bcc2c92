import { initLogger } from '../utils/logger.js';

// Plain JSON to stdout, errors only
initLogger({ level: 'error', jsonLogs: true });
