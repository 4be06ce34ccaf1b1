/**
 * Session phases and the transitions between them
 */

import { InvalidParameterError, type SessionError } from '../error.js';

export enum Role {
  Initiator = 'initiator',
  Responder = 'responder',
}

export type SessionPhase =
  | { kind: 'init' }
  | { kind: 'qkd-exchange'; attempt: number }
  | { kind: 'sifting'; attempt: number }
  | { kind: 'qber-check'; attempt: number }
  | { kind: 'reconciling'; attempt: number }
  | { kind: 'authenticating' }
  | { kind: 'key-derivation' }
  | { kind: 'active'; generation: number }
  | { kind: 'rotating'; fromGeneration: number }
  | { kind: 'aborted'; reason: SessionError }
  | { kind: 'closed' };

export type PhaseKind = SessionPhase['kind'];

export interface SessionState {
  role: Role;
  phase: SessionPhase;
  generation: number;
  peerAuthenticated: boolean;
}

const TRANSITIONS: Readonly<Record<PhaseKind, readonly PhaseKind[]>> = {
  init: ['qkd-exchange', 'aborted', 'closed'],
  'qkd-exchange': ['sifting', 'aborted', 'closed'],
  // back to qkd-exchange when the sifted key is too short and a fresh attempt starts
  sifting: ['qber-check', 'qkd-exchange', 'aborted', 'closed'],
  'qber-check': ['reconciling', 'aborted', 'closed'],
  // back to qkd-exchange when the corrected keys still differ
  reconciling: ['authenticating', 'qkd-exchange', 'aborted', 'closed'],
  authenticating: ['key-derivation', 'aborted', 'closed'],
  'key-derivation': ['active', 'aborted', 'closed'],
  active: ['rotating', 'aborted', 'closed'],
  rotating: ['qkd-exchange', 'aborted', 'closed'],
  aborted: [],
  closed: [],
};

export function canTransition(from: PhaseKind, to: PhaseKind): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PhaseKind, to: PhaseKind): void {
  if (!canTransition(from, to)) {
    throw new InvalidParameterError(`Illegal session transition ${from} -> ${to}`, [], { from, to });
  }
}

export function isTerminal(phase: SessionPhase): boolean {
  return phase.kind === 'aborted' || phase.kind === 'closed';
}
