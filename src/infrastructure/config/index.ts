// ConfigModule validates the environment when loaded; import it from './config.module'
export { EnvConfigService } from './env-config.service';
export {
  envSchema,
  validateEnv,
  EnvConfig,
  ConfigurationError,
  InstructionLanguage,
  INSTRUCTION_LANGUAGES,
} from './env.validation';
