/**
 * Catalog of the fixed/native operations. Nodes wrapping one of these carry a
 * compact descriptor instead of an operation object, and their float
 * parameters are compared with a relative tolerance.
 */

export interface StandardGateSpec {
  readonly numQubits: number;
  readonly numParams: number;
  /** True for gates applying a base gate under one or more controls. */
  readonly controlled: boolean;
}

export const STANDARD_GATES = {
  global_phase: { numQubits: 0, numParams: 1, controlled: false },
  id: { numQubits: 1, numParams: 0, controlled: false },
  x: { numQubits: 1, numParams: 0, controlled: false },
  y: { numQubits: 1, numParams: 0, controlled: false },
  z: { numQubits: 1, numParams: 0, controlled: false },
  h: { numQubits: 1, numParams: 0, controlled: false },
  s: { numQubits: 1, numParams: 0, controlled: false },
  sdg: { numQubits: 1, numParams: 0, controlled: false },
  t: { numQubits: 1, numParams: 0, controlled: false },
  tdg: { numQubits: 1, numParams: 0, controlled: false },
  sx: { numQubits: 1, numParams: 0, controlled: false },
  sxdg: { numQubits: 1, numParams: 0, controlled: false },
  rx: { numQubits: 1, numParams: 1, controlled: false },
  ry: { numQubits: 1, numParams: 1, controlled: false },
  rz: { numQubits: 1, numParams: 1, controlled: false },
  p: { numQubits: 1, numParams: 1, controlled: false },
  r: { numQubits: 1, numParams: 2, controlled: false },
  u: { numQubits: 1, numParams: 3, controlled: false },
  cx: { numQubits: 2, numParams: 0, controlled: true },
  cy: { numQubits: 2, numParams: 0, controlled: true },
  cz: { numQubits: 2, numParams: 0, controlled: true },
  ch: { numQubits: 2, numParams: 0, controlled: true },
  swap: { numQubits: 2, numParams: 0, controlled: false },
  iswap: { numQubits: 2, numParams: 0, controlled: false },
  ecr: { numQubits: 2, numParams: 0, controlled: false },
  crx: { numQubits: 2, numParams: 1, controlled: true },
  cry: { numQubits: 2, numParams: 1, controlled: true },
  crz: { numQubits: 2, numParams: 1, controlled: true },
  cp: { numQubits: 2, numParams: 1, controlled: true },
  rxx: { numQubits: 2, numParams: 1, controlled: false },
  ryy: { numQubits: 2, numParams: 1, controlled: false },
  rzz: { numQubits: 2, numParams: 1, controlled: false },
  ccx: { numQubits: 3, numParams: 0, controlled: true },
  cswap: { numQubits: 3, numParams: 0, controlled: true },
} as const satisfies Record<string, StandardGateSpec>;

export type StandardGateName = keyof typeof STANDARD_GATES;

export interface StandardInstructionSpec {
  /** Fixed qubit count, `null` when the width is chosen per instance (barrier). */
  readonly numQubits: number | null;
  readonly numClbits: number;
  readonly numParams: number;
  readonly directive: boolean;
}

export const STANDARD_INSTRUCTIONS = {
  measure: { numQubits: 1, numClbits: 1, numParams: 0, directive: false },
  reset: { numQubits: 1, numClbits: 0, numParams: 0, directive: false },
  barrier: { numQubits: null, numClbits: 0, numParams: 0, directive: true },
  delay: { numQubits: 1, numClbits: 0, numParams: 1, directive: false },
} as const satisfies Record<string, StandardInstructionSpec>;

export type StandardInstructionName = keyof typeof STANDARD_INSTRUCTIONS;

export function isStandardGateName(name: string): name is StandardGateName {
  return Object.prototype.hasOwnProperty.call(STANDARD_GATES, name);
}

export function isStandardInstructionName(name: string): name is StandardInstructionName {
  return Object.prototype.hasOwnProperty.call(STANDARD_INSTRUCTIONS, name);
}

export function standardGateSpec(gate: StandardGateName): StandardGateSpec {
  return STANDARD_GATES[gate];
}

export function standardInstructionSpec(instruction: StandardInstructionName): StandardInstructionSpec {
  return STANDARD_INSTRUCTIONS[instruction];
}
