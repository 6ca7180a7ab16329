import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { testConfig } from '../testing/fixtures';
import { BriefStorageService } from './brief-storage.service';

describe('BriefStorageService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'brief-storage-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  it('writes files under the dated directory', async () => {
    const storage = new BriefStorageService(testConfig({ outputDir }));

    const path = await storage.save('2025-01-04', 'brief.md', '# Daily Brief');

    expect(path).toBe(`${outputDir}/2025-01-04/brief.md`);
    await expect(readFile(path, 'utf-8')).resolves.toBe('# Daily Brief');
  });

  describe('publicUrl', () => {
    const expected =
      'https://raw.githubusercontent.com/owner/repo/pages/public/daily/2025-01-04/intro.mp3';
    let storage: BriefStorageService;

    beforeEach(() => {
      jest.spyOn(process, 'cwd').mockReturnValue('/srv/repo');
      storage = new BriefStorageService(
        testConfig({ githubRepo: 'owner/repo', githubBranch: 'pages' }),
      );
    });

    it('resolves relative paths against the repository root', () => {
      expect(storage.publicUrl('./public/daily/2025-01-04/intro.mp3')).toBe(expected);
      expect(storage.publicUrl('public/daily/2025-01-04/intro.mp3')).toBe(expected);
    });

    it('maps an absolute output directory inside the repository', () => {
      expect(storage.publicUrl('/srv/repo/public/daily/2025-01-04/intro.mp3')).toBe(expected);
    });

    it('has no URL for files outside the repository', () => {
      expect(storage.publicUrl('/var/tmp/daily/2025-01-04/intro.mp3')).toBeUndefined();
      expect(storage.publicUrl('../elsewhere/intro.mp3')).toBeUndefined();
    });
  });

  it('has no public URL without a repository', () => {
    const storage = new BriefStorageService(testConfig());

    expect(storage.publicUrl('public/daily/2025-01-04/intro.mp3')).toBeUndefined();
  });
});
