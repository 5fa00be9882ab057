import type { AnalysisResult } from './analysis/pipeline';
import type { CanonicalizationDebug } from './canon/table';

export type LastAnalysis = {
  analyzedAt: string;
  fileName?: string;
  rowCount: number;
  debug: CanonicalizationDebug;
};

/**
 * Holds the most recent analysis of one app instance so clients can see
 * which headers were mapped to what. Each request computes its own result; this
 * only keeps a read-only copy of the last one.
 */
export class LastAnalysisStore {
  private last: LastAnalysis | null = null;

  record(result: AnalysisResult) {
    this.last = {
      analyzedAt: new Date().toISOString(),
      fileName: result.fileName,
      rowCount: result.rowCount,
      debug: result.debug
    };
  }

  read(): LastAnalysis | null {
    return this.last;
  }
}
