import dotenv from 'dotenv';

dotenv.config();

export type EmptyTranslationPolicy = 'untranslated' | 'translated';

const policyFromEnv = (value: string | undefined, fallback: EmptyTranslationPolicy): EmptyTranslationPolicy => {
  if (value === 'untranslated' || value === 'translated') return value;
  return fallback;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',
  baseLocale: process.env.ADDON_BASE_LOCALE ?? 'en_GB',
  emptyTranslation: policyFromEnv(process.env.ADDON_EMPTY_TRANSLATION, 'untranslated'),
};
