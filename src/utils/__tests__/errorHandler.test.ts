import { reportSyncError } from '../errorHandler';
import { SyncError } from '../syncError';

describe('reportSyncError', () => {
  it('returns sync errors unchanged', () => {
    const error = SyncError.missingManifest('/srv/addons/plugin.test');

    expect(reportSyncError(error, '/srv/addons/plugin.test')).toBe(error);
  });

  it('wraps other errors as Unexpected', () => {
    const cause = new TypeError('boom');

    const error = reportSyncError(cause, '/srv/addons/plugin.test');

    expect(error).toBeInstanceOf(SyncError);
    expect(error.kind).toBe('Unexpected');
    expect(error.message).toBe('boom');
    expect(error.path).toBe('/srv/addons/plugin.test');
    expect(error.cause).toBe(cause);
  });

  it('wraps thrown values that are not errors', () => {
    const error = reportSyncError('plain failure', '/srv/addons/plugin.test');

    expect(error.kind).toBe('Unexpected');
    expect(error.message).toBe('plain failure');
  });
});
