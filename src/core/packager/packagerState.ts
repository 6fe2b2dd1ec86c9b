/**
 * 패키저 상태 머신
 * staged → descriptorsGenerated → invoked → {succeeded, failed}
 */

import { PackagerState } from '../../types';

export const PACKAGER_TRANSITIONS: Record<PackagerState, readonly PackagerState[]> = {
  staged: ['descriptorsGenerated', 'failed'],
  descriptorsGenerated: ['invoked', 'failed'],
  invoked: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

export class InvalidStateTransitionError extends Error {
  constructor(
    readonly from: PackagerState,
    readonly to: PackagerState
  ) {
    super(`잘못된 패키저 상태 전이: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

export function isTerminalPackagerState(state: PackagerState): boolean {
  return PACKAGER_TRANSITIONS[state].length === 0;
}

export class PackagerStateMachine {
  private current: PackagerState = 'staged';
  private readonly history: PackagerState[] = ['staged'];

  constructor(private onChange?: (state: PackagerState) => void) {
    onChange?.('staged');
  }

  get state(): PackagerState {
    return this.current;
  }

  getHistory(): PackagerState[] {
    return [...this.history];
  }

  transition(to: PackagerState): void {
    if (!PACKAGER_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
    this.onChange?.(to);
  }

  /** 이미 종료 상태면 아무 것도 하지 않는다 */
  fail(): void {
    if (!isTerminalPackagerState(this.current)) {
      this.transition('failed');
    }
  }
}
