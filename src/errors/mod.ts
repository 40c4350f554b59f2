/**
 * Errors Module
 *
 * @module errors
 */

export {
  AlreadyConnectedError,
  AmbiguousRuleError,
  DisconnectedInterfaceError,
  DuplicateNodeError,
  InferenceError,
  InterfaceNotFoundError,
  MissingMessageError,
  NodeNotFoundError,
  NoFreeInterfaceError,
  OwnershipError,
  PreconditionError,
  RuleNotFoundError,
  SelfLoopError,
  StructuralError,
  TypeMismatchError,
  UpstreamUnavailableError,
} from "./error-types.ts";
