import * as fs from 'fs/promises';
import * as path from 'path';
import { BatchRepository } from '../../application/ports/BatchRepository';
import { BatchReport } from '../../application/services/batch/BatchRunner';
import { BatchFile, batchFileSchema } from '../../domain/automation/StepScript';
import { InvalidJobError, describeError } from '../../domain/errors/OrchestratorErrors';

/**
 * File-based implementation of BatchRepository.
 * Relative locations resolve against the base directory (the working directory by default).
 */
export class FileBasedBatchRepository implements BatchRepository {
  private baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = baseDir || process.cwd();
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  async loadBatch(location: string): Promise<BatchFile> {
    const filePath = this.resolve(location);
    const data = await fs.readFile(filePath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new InvalidJobError(`batch file ${filePath} is not valid JSON: ${describeError(error)}`);
    }

    const parsed = batchFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InvalidJobError(`batch file ${filePath}: ${issues}`);
    }
    return parsed.data;
  }

  async saveReport(report: BatchReport, location: string): Promise<string> {
    const filePath = this.resolve(location);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
    return filePath;
  }

  private resolve(location: string): string {
    return path.resolve(this.baseDir, location);
  }
}
