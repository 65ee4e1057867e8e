export {
  Bit,
  clbit,
  qubit,
  wiresEqual,
  type BitKind,
  type Wire,
} from "./circuit/wires.js";
export {
  SymbolicParameter,
  describeParam,
  expressionParam,
  floatParam,
  isParameterized,
  objectParam,
  paramEquals,
  paramsEqual,
  relativeEq,
  toParam,
  type Equatable,
  type Param,
  type ParamLike,
  type ParameterExpression,
} from "./circuit/parameters.js";
export {
  STANDARD_GATES,
  STANDARD_INSTRUCTIONS,
  isStandardGateName,
  isStandardInstructionName,
  standardGateSpec,
  standardInstructionSpec,
  type StandardGateName,
  type StandardGateSpec,
  type StandardInstructionName,
  type StandardInstructionSpec,
} from "./circuit/standard.js";
export {
  Gate,
  Instruction,
  StandardGate,
  StandardInstruction,
  UnitaryGate,
  copyMatrix,
  matricesEqual,
  type Complex,
  type ComplexMatrix,
  type OperationObject,
  type StandardInstructionOptions,
} from "./circuit/instruction.js";
export {
  duplicateOperation,
  expectedParamCount,
  extractOperation,
  isOperationObject,
  materializeOperation,
  operationMatrix,
  operationName,
  operationNumClbits,
  operationNumQubits,
  operationsEqual,
  ownedOperationObject,
  renameOperation,
  withPayload,
  type ExtractedOperation,
  type PackedOperation,
  type PackedOperationKind,
} from "./circuit/operations.js";

export { DETACHED_INDEX, NodeHandle } from "./dag/identity.js";
export { NodeHasher } from "./dag/hash.js";
export { OperationNode, type CircuitInstruction, type DeepCopyOptions } from "./dag/opNode.js";
export { BoundaryNode, inputNode, outputNode, type InputNode, type OutputNode } from "./dag/boundaryNode.js";
export {
  compareNodes,
  hashNode,
  isDagNode,
  isInputNode,
  isOperationNode,
  isOutputNode,
  nodesEqual,
  sortNodes,
  type DagNode,
} from "./dag/node.js";
export { restoreNode, snapshotNode } from "./dag/snapshot.js";
export {
  SNAPSHOT_FORMAT_VERSION,
  bitWireCodec,
  decodeSnapshot,
  deserializeNode,
  encodeSnapshot,
  serializeNode,
  type CustomCodec,
  type JsonValue,
  type SerializedFloat,
  type SerializedNodeSnapshot,
  type SerializedOperation,
  type SerializedParam,
  type SnapshotCodecOptions,
  type WireCodec,
} from "./dag/codec.js";
export type {
  BoundaryKind,
  BoundaryNodeSnapshot,
  DagNodeBehaviour,
  DagNodeKind,
  NodeSnapshot,
  OperationNodeSnapshot,
  SnapshotEnvelope,
} from "./dag/types.js";
export { NodeSnapshotError, NodeValidationError, OperationTypeError } from "./dag/errors.js";
export { configureNodeLogger, getNodeLogger } from "./dag/log.js";

export {
  DEFAULT_PARAMETER_TOLERANCE,
  MAX_PARAMETER_TOLERANCE,
  configureNodes,
  getNodeConfig,
  loadNodeConfigFromEnv,
  resetNodeConfig,
  type NodeConfig,
  type NodeConfigOverrides,
} from "./config/nodeConfig.js";
export { ERROR_CATALOG, ERROR_CODES, type ErrorCode } from "./types.js";
export { LOG_LEVELS, StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
