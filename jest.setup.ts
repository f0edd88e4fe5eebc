process.env.LOG_LEVEL = 'silent';
process.env.NODE_ENV = 'test';
process.env.ADDON_BASE_LOCALE = 'en_GB';
process.env.ADDON_EMPTY_TRANSLATION = 'untranslated';
