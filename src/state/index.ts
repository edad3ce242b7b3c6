export {
  getStateDir,
  sanitizeSessionId,
  fingerprint,
  SessionCoordinator,
  STATE_DIR_ENV,
  RETENTION_MS,
} from './manager.js';
