import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FileBasedBatchRepository } from '../../../src/infrastructure/persistence/FileBasedBatchRepository';
import { BatchReport } from '../../../src/application/services/batch/BatchRunner';
import { InvalidJobError } from '../../../src/domain/errors/OrchestratorErrors';

describe('FileBasedBatchRepository', () => {
  let repository: FileBasedBatchRepository;
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'batch-repo-test-'));
    repository = new FileBasedBatchRepository(testDir);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  const writeFile = (name: string, content: string): Promise<void> =>
    fs.writeFile(path.join(testDir, name), content, 'utf-8');

  describe('loadBatch', () => {
    it('should load and validate a batch file relative to the base directory', async () => {
      await writeFile(
        'jobs.json',
        JSON.stringify({
          defaults: { timeoutMs: 5000 },
          jobs: [{ id: 'home', steps: [{ type: 'extract_text', selector: 'h1', as: 'heading' }] }],
        })
      );

      const batch = await repository.loadBatch('jobs.json');

      expect(batch.defaults).toEqual({ timeoutMs: 5000 });
      expect(batch.jobs[0].steps).toEqual([
        { type: 'extract_text', selector: 'h1', as: 'heading', all: false },
      ]);
    });

    it('should reject a file that is not JSON', async () => {
      await writeFile('broken.json', '{ jobs: ');

      await expect(repository.loadBatch('broken.json')).rejects.toThrow(
        `Invalid job: batch file ${path.join(testDir, 'broken.json')} is not valid JSON: `
      );
    });

    it('should reject duplicate job ids', async () => {
      await writeFile(
        'dupes.json',
        JSON.stringify({
          jobs: [
            { id: 'a', steps: [{ type: 'wait', ms: 1 }] },
            { id: 'a', steps: [{ type: 'wait', ms: 1 }] },
          ],
        })
      );

      const attempt = repository.loadBatch('dupes.json');

      await expect(attempt).rejects.toThrow(InvalidJobError);
      await expect(attempt).rejects.toThrow("jobs.1.id: Duplicate job id 'a'");
    });

    it('should reject a batch without jobs', async () => {
      await writeFile('empty.json', JSON.stringify({ jobs: [] }));

      await expect(repository.loadBatch('empty.json')).rejects.toThrow(InvalidJobError);
    });

    it('should propagate a missing file', async () => {
      await expect(repository.loadBatch('missing.json')).rejects.toThrow('ENOENT');
    });
  });

  describe('saveReport', () => {
    it('should write the report and create missing directories', async () => {
      const report: BatchReport = {
        startedAt: '2026-01-01T10:00:00.000Z',
        finishedAt: '2026-01-01T10:00:01.000Z',
        durationMs: 1000,
        summary: { succeeded: 1, failed: 0, timed_out: 0, cancelled: 0, rejected: 0 },
        jobs: [{ index: 0, id: 'home', label: 'home', status: 'succeeded', result: { heading: 'Hi' } }],
      };

      const savedPath = await repository.saveReport(report, 'reports/run.json');

      expect(savedPath).toBe(path.join(testDir, 'reports', 'run.json'));
      const saved: unknown = JSON.parse(await fs.readFile(savedPath, 'utf-8'));
      expect(saved).toEqual(report);
    });
  });

  it('should default the base directory to the working directory', () => {
    expect(new FileBasedBatchRepository().getBaseDir()).toBe(process.cwd());
  });
});
