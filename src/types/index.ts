export type {
  HexString,
  PublicKeyXOnly,
  PrivateKeyHex,
  SchnorrSignatureHex,
} from './keys.js';

export type { ErrorCode, ErrorObject } from './errors.js';
export { ErrorCodes } from './errors.js';

export type {
  MediaType,
  TextPart,
  RawPart,
  UrlPart,
  DataPart,
  Part,
} from './part.js';

export type { Artifact } from './artifact.js';

export type {
  TaskState,
  TerminalTaskState,
  MessageRole,
  Message,
  TaskStatus,
  Task,
} from './task.js';

export type {
  TaskStatusUpdateEvent,
  TaskArtifactUpdateEvent,
  TaskEvent,
  StreamErrorEvent,
  StreamEvent,
} from './events.js';

export type {
  TaskDelta,
  ExecutionContext,
  ResubscribeContext,
  AgentExecutor,
} from './executor.js';

export type {
  MessageSendParams,
  SendMessageResult,
  TaskQueryParams,
  TaskIdParams,
} from './payloads.js';

export type {
  JsonRpcId,
  MethodName,
  MethodPayloadMap,
  JsonRpcRequest,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
} from './rpc.js';

export type {
  LogLevel,
  Logger,
  TaskStore,
  TransportSendOptions,
  RpcHandler,
  TransportPlugin,
} from './plugin.js';

export type {
  Skill,
  Capabilities,
  Provider,
  AgentCard,
  SignedAgentCard,
  AgentCardVerifier,
} from './agent-card.js';
