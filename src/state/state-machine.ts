import type { PipelineState } from "../shared/types/pipeline.types";
import { isAllowedTransition, isTerminalState } from "./transition-rules";

export function assertTransition(from: PipelineState, to: PipelineState): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}

export class PipelineStateMachine {
  private current: PipelineState = "INGESTING";
  private readonly history: PipelineState[] = ["INGESTING"];

  get state(): PipelineState {
    return this.current;
  }

  get path(): ReadonlyArray<PipelineState> {
    return this.history;
  }

  transition(to: PipelineState): void {
    assertTransition(this.current, to);
    this.current = to;
    this.history.push(to);
  }

  abort(): void {
    if (!isTerminalState(this.current)) {
      this.transition("ABORTED");
    }
  }
}
