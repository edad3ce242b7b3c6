export {
  getConfigPaths,
  validateConfigPath,
  expandEnv,
  loadJsoncFile,
  checkFilePermissions,
  loadConfigFromPath,
  loadVoiceConfig,
  validateVoiceConfig,
  maskSecrets,
  generateExampleConfig,
  voiceConfigFileSchema,
  CONFIG_FILE_NAME,
  SUPPORTED_PROVIDERS,
  POLLY_REGIONS,
} from './loader.js';
export type { LoadVoiceConfigOptions, LoadedVoiceConfig } from './loader.js';
export {
  resolve,
  VOICE_DEFAULTS,
  ENGINE_PORTS,
  API_KEY_ENV,
  ENGINE_VOICEVOX,
  ENGINE_AIVISSPEECH,
} from './resolve.js';
