import type { PipelineState } from "../shared/types/pipeline.types";

const transitionRules: Record<PipelineState, PipelineState[]> = {
  INGESTING: ["EXTRACTING", "ABORTED"],
  EXTRACTING: ["FEEDBACK", "ABORTED"],
  FEEDBACK: ["DONE", "ABORTED"],
  DONE: [],
  ABORTED: [],
};

export function isAllowedTransition(from: PipelineState, to: PipelineState): boolean {
  return transitionRules[from].includes(to);
}

export function isTerminalState(state: PipelineState): boolean {
  return transitionRules[state].length === 0;
}
