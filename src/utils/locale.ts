import type { LocaleCode } from './file-handlers/types';

// language, optional region, optional variant: de, pt_br, sr_rs@latin
export const LOCALE_CODE_SOURCE = '[a-z]{2,3}(?:_[A-Za-z]{2})?(?:@\\S+)?';

export const LOCALE_CODE_PATTERN = new RegExp(`^${LOCALE_CODE_SOURCE}$`);

/** `en_gb` → `en_GB`, `sr_rs@latin` → `sr_RS@latin`; codes without a region are returned as is. */
export const normalizeLocaleCode = (code: string): LocaleCode => {
  const separator = code.indexOf('_');
  if (separator < 0) return code;
  const region = code.slice(separator + 1);
  return `${code.slice(0, separator)}_${region.slice(0, 2).toUpperCase()}${region.slice(2)}`;
};
