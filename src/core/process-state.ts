/**
 * Process State — lifecycle states of a supervised process and the allowed
 * transitions between them.
 *
 * "running" → "running" is a restart: the monitor replaced the exited child
 * with a new one. "killed" is terminal.
 *
 * @module ProcessControl
 */

export const PROCESS_STATES = ["not_started", "running", "exited", "killed"] as const;

export type ProcessState = (typeof PROCESS_STATES)[number];

const ALLOWED_TRANSITIONS: Record<ProcessState, ReadonlySet<ProcessState>> = {
  not_started: new Set(["running"]),
  running: new Set(["running", "exited", "killed"]),
  exited: new Set(["running"]),
  killed: new Set(),
};

export function isProcessTransitionAllowed(from: ProcessState, to: ProcessState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export function isTerminalState(state: ProcessState): boolean {
  return ALLOWED_TRANSITIONS[state].size === 0;
}
