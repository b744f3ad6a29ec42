import { getEnvVariable } from '@/services/utils/env';

export const APP_NAME = 'tmx-aligner';
export const APP_VERSION = '0.1.0';

// Centralized environment variable access (the logger reads TMX_ALIGNER_LOG_LEVEL itself)
export const ENV = {
  SETTINGS_DIR: getEnvVariable('TMX_ALIGNER_SETTINGS_DIR'),
} as const;
