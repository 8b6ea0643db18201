import type {Registers} from './registers.ts';

/** The register an item maps to and the run-length count it observed. */
export type RegisterUpdate = {
  index: number;
  value: number;
};

export type DecodedSketch = {
  precision: number;
  registers: Registers;
};

/**
 * Turns an arbitrary item into a register update for a sketch with
 * `2^precision` registers.
 */
export interface HashStrategy {
  hash(precision: number, item: unknown): RegisterUpdate;
}

/** Binary representation of a register set. */
export interface SketchCodec {
  encode(precision: number, registers: Registers): Uint8Array;
  decode(bytes: Uint8Array): DecodedSketch;
}
