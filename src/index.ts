// Types
export * from './types/index.js';

// Errors
export { A2AError } from './errors/A2AError.js';

// Lifecycle
export { TaskLifecycle } from './lifecycle/TaskLifecycle.js';
export type { CreateTaskInit } from './lifecycle/TaskLifecycle.js';

// Streaming & concurrency
export { EventChannel } from './streaming/EventChannel.js';
export type { EventChannelOptions } from './streaming/EventChannel.js';
export { KeyedMutex } from './concurrency/KeyedMutex.js';
export type { Release } from './concurrency/KeyedMutex.js';

// Validation
export { PayloadValidator } from './messaging/PayloadValidator.js';
export type { RequestEnvelope } from './messaging/PayloadValidator.js';

// Server
export { RequestHandler } from './server/RequestHandler.js';
export type { RequestHandlerConfig, ConcurrencyPolicy } from './server/RequestHandler.js';
export { JsonRpcDispatcher } from './server/JsonRpcDispatcher.js';
export type { JsonRpcDispatcherConfig } from './server/JsonRpcDispatcher.js';

// Stores
export { InMemoryTaskStore } from './stores/InMemoryTaskStore.js';
export { FileTaskStore } from './stores/FileTaskStore.js';
export type { FileTaskStoreConfig } from './stores/FileTaskStore.js';

// Crypto
export { CardSigner } from './crypto/CardSigner.js';
export type { CardSignOptions } from './crypto/CardSigner.js';
export { SchnorrCardVerifier } from './crypto/SchnorrCardVerifier.js';
export type { SchnorrCardVerifierConfig } from './crypto/SchnorrCardVerifier.js';

// Agent
export { AgentCardBuilder } from './agent/AgentCardBuilder.js';
export { A2AServer } from './agent/A2AServer.js';
export type { A2AServerConfig } from './agent/A2AServer.js';

// Client
export { A2AClient } from './client/A2AClient.js';
export type { A2AClientOptions } from './client/A2AClient.js';

// Transports
export { HttpTransport, AGENT_CARD_PATH } from './transport/HttpTransport.js';
export type { HttpTransportConfig, DiscoverOptions } from './transport/HttpTransport.js';

export { WebSocketTransport } from './transport/WebSocketTransport.js';
export type { WebSocketTransportConfig } from './transport/WebSocketTransport.js';
