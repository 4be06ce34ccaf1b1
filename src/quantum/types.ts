/**
 * Simulated BB84 data model
 */

export type Bit = 0 | 1;

/** Measurement basis */
export enum Basis {
  Rectilinear = 0,
  Diagonal = 1,
}

/**
 * Bit/basis pairs prepared (or measured) by one endpoint for one attempt.
 * Frozen on creation.
 */
export interface BitBasisStream {
  readonly bits: readonly Bit[];
  readonly bases: readonly Basis[];
  /** Channel noise this stream is transmitted with unless overridden */
  readonly errorRate: number;
}

export interface SiftedKey {
  readonly bits: readonly Bit[];
  /** Raw stream index of every retained bit */
  readonly positions: readonly number[];
}

export type QberDecision = 'accept' | 'abort';

export interface QberReport {
  readonly sampleSize: number;
  readonly mismatches: number;
  readonly errorRate: number;
  readonly decision: QberDecision;
}
