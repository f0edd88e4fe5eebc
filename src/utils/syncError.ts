export type SyncErrorKind =
  | 'MissingManifest'
  | 'MissingBaseCatalog'
  | 'MissingField'
  | 'ParseError'
  | 'ReadError'
  | 'WriteError'
  | 'InvalidArguments'
  | 'Unexpected';

export class SyncError extends Error {
  constructor(
    public readonly kind: SyncErrorKind,
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SyncError';
  }

  static missingManifest(addonDir: string) {
    return new SyncError('MissingManifest', `No addon.xml found in ${addonDir}`, addonDir);
  }

  static missingBaseCatalog(addonDir: string, baseLocale: string) {
    return new SyncError(
      'MissingBaseCatalog',
      `No ${baseLocale} catalog found in ${addonDir}`,
      addonDir,
    );
  }

  static parse(filePath: string, detail: string, cause?: unknown) {
    return new SyncError('ParseError', `Failed to parse ${filePath}: ${detail}`, filePath, { cause });
  }

  static read(filePath: string, cause: unknown) {
    return new SyncError('ReadError', `Failed to read ${filePath}: ${describeCause(cause)}`, filePath, { cause });
  }

  static write(filePath: string, cause: unknown) {
    return new SyncError('WriteError', `Failed to write ${filePath}: ${describeCause(cause)}`, filePath, { cause });
  }

  static invalidArguments(message: string) {
    return new SyncError('InvalidArguments', message);
  }

  static unexpected(cause: unknown, path?: string) {
    return new SyncError('Unexpected', describeCause(cause), path, { cause });
  }
}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
