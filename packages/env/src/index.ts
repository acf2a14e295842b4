export {
  getConfigPath,
  getVenueCredentials,
  parseEnv,
  resetEnv,
  type ValidatedEnv,
} from './config.js';
