import type { TaskState, TerminalTaskState } from '../types/message.js';

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TerminalTaskState>(['completed', 'failed']);

export function isTerminalState(state: TaskState): state is TerminalTaskState {
  return TERMINAL_STATES.has(state);
}
