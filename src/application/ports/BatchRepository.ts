import { BatchFile } from '../../domain/automation/StepScript';
import { BatchReport } from '../services/batch/BatchRunner';

/**
 * Repository interface for batch inputs and their reports.
 */
export interface BatchRepository {
  /**
   * Load and validate a batch file.
   */
  loadBatch(location: string): Promise<BatchFile>;

  /**
   * Persist a report; returns where it was written.
   */
  saveReport(report: BatchReport, location: string): Promise<string>;
}
