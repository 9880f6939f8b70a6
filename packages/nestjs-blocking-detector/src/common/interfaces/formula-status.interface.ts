import { DetectorState } from '../../detector/detector-state.enum';

/**
 * Formula 状态快照
 */
export interface FormulaStatus {
  formulaId: string;
  state: DetectorState;
  blocked: boolean;
  lastPoisonId: number | null;
}

export interface FormulaRuntimeStatus extends FormulaStatus {
  queueName: string;
  running: boolean;
}
