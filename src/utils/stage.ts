import { PROCESS_STAGES, type ProcessStage } from './constants.js';

export function isProcessStage(value: string): value is ProcessStage {
  return PROCESS_STAGES.some(stage => stage === value);
}

/**
 * Position of a stage marker in pipeline order, or -1 for unknown markers.
 */
export function stageIndex(stage: string | undefined): number {
  if (stage === undefined) {
    return -1;
  }
  return PROCESS_STAGES.findIndex(candidate => candidate === stage);
}

/**
 * A document is at or past `target` when its recorded stage sits at the same
 * position or later. Unknown or missing markers never count as completed.
 */
export function isStageCompleted(current: string | undefined, target: ProcessStage): boolean {
  const currentIndex = stageIndex(current);
  if (currentIndex < 0) {
    return false;
  }
  return currentIndex >= stageIndex(target);
}

export function shouldSkipStage(current: string | undefined, target: ProcessStage, force = false): boolean {
  if (force) {
    return false;
  }
  return isStageCompleted(current, target);
}
