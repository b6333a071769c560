import type { PipelineState } from '../types';

export const PIPELINE_TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  received: ['rasterized', 'failed'],
  rasterized: ['extracted', 'failed'],
  extracted: ['parsed', 'failed'],
  parsed: ['persisted', 'failed'],
  persisted: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: PipelineState, readonly to: PipelineState) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[state].length === 0;
}

/**
 * Tracks one document's progress through the pipeline. A persistence retry
 * starts from `parsed`; everything else starts from `received`.
 */
export class DocumentRun {
  private current: PipelineState;
  private readonly visited: PipelineState[];

  constructor(initial: PipelineState = 'received') {
    this.current = initial;
    this.visited = [initial];
  }

  get state(): PipelineState {
    return this.current;
  }

  get history(): PipelineState[] {
    return [...this.visited];
  }

  advance(to: PipelineState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
