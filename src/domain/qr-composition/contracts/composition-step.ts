import type {
  CompositionRequest,
  ErrorCorrectionLevel,
} from '../value-objects/composition-options.js';

export interface CompositionStepResult {
  readonly versionUsed: number;
  readonly levelUsed: ErrorCorrectionLevel;
  /** File name inside `request.saveDir` the step wrote. */
  readonly outputName: string;
}

export interface CompositionStep {
  compose(request: CompositionRequest): Promise<CompositionStepResult>;
}
