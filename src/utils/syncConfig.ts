import path from 'path';
import { z } from 'zod';
import { env } from './env';
import { LOCALE_CODE_PATTERN, normalizeLocaleCode } from './locale';
import { SyncError } from './syncError';

export const SYNC_DIRECTIONS = ['po-to-xml', 'xml-to-po', 'both'] as const;

export type SyncDirection = (typeof SYNC_DIRECTIONS)[number];

const syncConfigSchema = z.object({
  direction: z.enum(SYNC_DIRECTIONS),
  path: z
    .string()
    .min(1)
    .transform((value) => path.resolve(value)),
  multipleAddons: z.boolean(),
  baseLocale: z.string().regex(LOCALE_CODE_PATTERN, 'Invalid locale code').transform(normalizeLocaleCode),
  emptyTranslation: z.enum(['untranslated', 'translated']),
});

export type SyncConfig = Readonly<z.output<typeof syncConfigSchema>>;

export type SyncConfigInput = Partial<z.input<typeof syncConfigSchema>>;

export const resolveSyncConfig = (input: SyncConfigInput = {}): SyncConfig => {
  const result = syncConfigSchema.safeParse({
    direction: input.direction ?? 'both',
    path: input.path ?? '.',
    multipleAddons: input.multipleAddons ?? false,
    baseLocale: input.baseLocale ?? env.baseLocale,
    emptyTranslation: input.emptyTranslation ?? env.emptyTranslation,
  });

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw SyncError.invalidArguments(`Invalid configuration (${details})`);
  }

  return Object.freeze(result.data);
};
