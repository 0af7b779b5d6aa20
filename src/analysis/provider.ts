import type { RiskJudgment } from '../core/types.js';
import type { Rubric } from './rubric.js';

export interface AnalysisRequest {
  company: string;
  priorYear: number;
  currentYear: number;
  /** Empty when the passage has no counterpart in the prior year. */
  priorText: string;
  /** Empty when the passage was dropped in the current year. */
  currentText: string;
  rubric: Rubric;
}

/**
 * The semantic judge behind the scorer. Implementations may call a remote
 * model; the scorer validates whatever comes back against the rubric.
 */
export interface AnalysisProvider {
  readonly name: string;
  judge(request: AnalysisRequest, signal?: AbortSignal): Promise<RiskJudgment>;
}
