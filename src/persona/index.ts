export {
  getPersonaConfigPaths,
  loadPersonaConfigFile,
  loadPersonaConfig,
  savePersonaConfig,
  defaultPersonaConfig,
  validatePersonaConfig,
  toPersonaVoice,
  PERSONA_FILE_NAME,
} from './config.js';
export { PersonaStore, personaTemplate, PERSONA_HEADER } from './store.js';
