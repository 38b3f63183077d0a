export { createEntityEnvironment, usecTimestampNow } from './Environment.js';
export { createConsoleLogger, silentLogger, LogLevel } from './Logger.js';
export type { Logger, ConsoleLoggerOptions } from './Logger.js';
export { DecodeError } from './errors.js';

export { encodeCount, readCount, writeCount, countCodedLength, MAX_COUNT_BYTES } from './ByteCountCoding.js';
export { PropertyFlags } from './PropertyFlags.js';
export { ProtocolEncoder, ProtocolDecoder } from './Protocol.js';
export { EntityPacketData } from './PacketData.js';

export { SimulationOwner, SIMULATION_OWNER_BYTES } from './SimulationOwner.js';
export type { SimulationOwnerData } from './SimulationOwner.js';

export { reconcileRemoteEdit, adjustForSkew, adjustCreatedTime, deriveFromDelta } from './TimestampReconciler.js';
export type { RemoteEditInput, RemoteEditDecision, RejectReason } from './TimestampReconciler.js';

export { simulateKinematicMotion, computeRotationStep } from './KinematicMotion.js';
export type { KinematicState, KinematicResult } from './KinematicMotion.js';

export { ENTITY_PROPERTIES, PROPERTY_COUNT, propertiesForVersion, propertyByName, flagsFor } from './EntityProperties.js';
export type {
  EntityPropertyValues,
  EntityPropertyDelta,
  EntityPropertyEntry,
  PropertyName,
  PropertyGate,
} from './EntityProperties.js';

export {
  encodeEntityRecord,
  decodeEntityRecord,
  readEntityDataFromBuffer,
  adjustEditPacketForClockSkew,
  peekEntityId,
  MINIMUM_HEADER_BYTES,
} from './EntityCodec.js';
export type { AppendState, EncodeParams, EncodeResult, DecodedEntityRecord, ReadEntityArgs } from './EntityCodec.js';

export { createEncodeContinuation } from './EncodeContinuation.js';
export type { EncodeContinuation } from './EncodeContinuation.js';

export { ArgumentAction, createActionFactory } from './EntityAction.js';
export type {
  EntityAction,
  ActionArguments,
  ActionFactory,
  ActionRegistration,
  ActionRegistry,
  ActionSimulation,
} from './EntityAction.js';
export { ActionLedger, serializeActions, parseActionData } from './ActionLedger.js';
export type { SerializeResult } from './ActionLedger.js';

export {
  EntityItem,
  defaultCollisionMask,
  COLLISION_GROUP_DYNAMIC,
  COLLISION_GROUP_STATIC,
  COLLISION_GROUP_KINEMATIC,
  COLLISION_GROUP_MY_AVATAR,
  COLLISION_GROUP_OTHER_AVATAR,
  COLLISION_GROUP_COLLISIONLESS,
  COLLISION_MASK_AVATARS,
} from './EntityItem.js';
export type { EntityEdit, EntityItemOptions, CollisionGroupAndMask } from './EntityItem.js';

export { createEntityTree, DEFAULT_MAX_PACKET_SIZE } from './EntityTree.js';
export type {
  EntityTree,
  SpatialIndex,
  TreeSimulation,
  ReadPacketResult,
  ReadErasePacketResult,
  EncodePacketsOptions,
} from './EntityTree.js';

export { createEntitySimulation } from './EntitySimulation.js';
export type { EntitySimulation, StepResult, OwnershipChange } from './EntitySimulation.js';

export { createPoseMirror, Pose } from './PoseMirror.js';
export type { PoseMirror, PoseSample } from './PoseMirror.js';

export { createEntityServer, createWsTransport } from './EntityServer.js';
export type { EntityServer, EntityServerOptions, ServerTransport, TransportHandlers, TickStats } from './EntityServer.js';

export type { EntityId, EntityType, ClientId, EntityEnvironment, EntityEnvironmentOptions, EntityServerConfig } from './types.js';
export {
  EntityTypes,
  NULL_ID,
  CURRENT_PROTOCOL_VERSION,
  MSG_ENTITY_DATA,
  MSG_ENTITY_ERASE,
  USECS_PER_SECOND,
} from './types.js';
