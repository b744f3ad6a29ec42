import i18next from 'i18next';
import { logger } from '@/services/utils/logger';

// Translation resources
import enUS from './locales/en-US';
import jaJP from './locales/ja-JP';

export const SUPPORTED_LANGUAGES = ['en-US', 'ja-JP'] as const;
export type UiLanguage = (typeof SUPPORTED_LANGUAGES)[number];

// Resources are bundled, so with initImmediate off the instance is ready on return
const i18n = i18next.createInstance(
  {
    resources: {
      'en-US': enUS,
      'ja-JP': jaJP,
    },
    lng: 'en-US',
    fallbackLng: 'en-US',
    ns: ['errors', 'history'],
    defaultNS: 'errors',
    interpolation: {
      escapeValue: false, // messages go to logs and plain-text UI, not HTML
    },
    initImmediate: false,
  },
  (err) => {
    if (err) logger.error('[i18n] Failed to initialize translations', err);
  }
);

i18n.on('languageChanged', (lng) => {
  logger.debug(`[i18n] UI language changed to ${lng}`);
});

export default i18n;
