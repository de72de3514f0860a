import { describe, expect, it } from 'vitest';
import { createBufferedReporter, reportArchiveListing } from './reporter.js';

describe('reportArchiveListing', () => {
  it('should list every archive under the limit', () => {
    const reporter = createBufferedReporter();

    reportArchiveListing(reporter, '/backups', ['docs.tar', 'photos.tar']);

    expect(reporter.lines).toEqual([
      '',
      'Archives created in: /backups',
      'File format: directory_name.tar (uncompressed)',
      '',
      'Created archives:',
      'docs.tar',
      'photos.tar',
    ]);
  });

  it('should say so when the output directory could not be listed', () => {
    const reporter = createBufferedReporter();

    reportArchiveListing(reporter, '/backups', undefined);

    expect(reporter.lines).toEqual([
      '',
      'Archives created in: /backups',
      'File format: directory_name.tar (uncompressed)',
      '',
      'Created archives:',
      '(Unable to list archives)',
    ]);
  });
});
