import { A2AError } from '../errors/A2AError.js';
import type { AgentCard, Capabilities, Skill, SignedAgentCard } from '../types/agent-card.js';
import type { Artifact } from '../types/artifact.js';
import type { ErrorObject } from '../types/errors.js';
import type { TaskEvent } from '../types/events.js';
import type { Part } from '../types/part.js';
import type { MessageSendParams, TaskIdParams, TaskQueryParams } from '../types/payloads.js';
import type { JsonRpcId, JsonRpcResponse } from '../types/rpc.js';
import type { Message, Task, TaskState, TaskStatus } from '../types/task.js';

/** A JSON-RPC request whose envelope has been checked; params are still unchecked. */
export interface RequestEnvelope {
  id: JsonRpcId;
  method: string;
  params: unknown;
}

const TASK_STATES: ReadonlySet<string> = new Set<TaskState>([
  'submitted',
  'working',
  'input_required',
  'completed',
  'failed',
  'canceled',
]);
const HEX_64 = /^[0-9a-f]{64}$/;
const HEX_128 = /^[0-9a-f]{128}$/;

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Structural checks for everything that crosses the wire: inbound requests,
 * stored tasks, responses read by the client, and discovery documents.
 * `parse*` functions throw `A2AError`; `is*` functions are type guards.
 */
export class PayloadValidator {
  static isJsonRpcId(value: unknown): value is JsonRpcId {
    return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
  }

  /** Check the JSON-RPC 2.0 envelope of an inbound request. */
  static parseRequest(value: unknown): RequestEnvelope {
    if (!isObject(value)) throw A2AError.invalidRequest('Request must be a JSON object');
    if (value.jsonrpc !== '2.0') throw A2AError.invalidRequest('jsonrpc must be "2.0"');
    if (!PayloadValidator.isJsonRpcId(value.id)) throw A2AError.invalidRequest('id must be a string, number or null');
    if (!isNonEmptyString(value.method)) throw A2AError.invalidRequest('method must be a non-empty string');
    return { id: value.id, method: value.method, params: value.params };
  }

  /** Best-effort id of a request that may fail validation, for error responses. */
  static requestId(value: unknown): JsonRpcId {
    return isObject(value) && PayloadValidator.isJsonRpcId(value.id) ? value.id : null;
  }

  static parsePart(value: unknown): Part {
    if (!isObject(value)) throw A2AError.invalidParams('Part must be an object');
    switch (value.kind) {
      case 'text':
        if (typeof value.text !== 'string') break;
        if (!optionalString(value.mediaType)) break;
        return { kind: 'text', text: value.text, ...(value.mediaType !== undefined ? { mediaType: value.mediaType } : {}) };
      case 'raw':
        if (typeof value.raw !== 'string' || !isNonEmptyString(value.mediaType)) break;
        return { kind: 'raw', raw: value.raw, mediaType: value.mediaType };
      case 'url':
        if (!isNonEmptyString(value.url) || !optionalString(value.mediaType)) break;
        return { kind: 'url', url: value.url, ...(value.mediaType !== undefined ? { mediaType: value.mediaType } : {}) };
      case 'data':
        if (!isObject(value.data) || !optionalString(value.mediaType)) break;
        return { kind: 'data', data: value.data, ...(value.mediaType !== undefined ? { mediaType: value.mediaType } : {}) };
      default:
        throw A2AError.invalidParams(`Unknown part kind: ${String(value.kind)}`);
    }
    throw A2AError.invalidParams(`Malformed ${String(value.kind)} part`);
  }

  static parseMessage(value: unknown): Message {
    if (!isObject(value)) throw A2AError.invalidParams('message must be an object');
    if (value.kind !== undefined && value.kind !== 'message') throw A2AError.invalidParams('message.kind must be "message"');
    if (!isNonEmptyString(value.messageId)) throw A2AError.invalidParams('message.messageId must be a non-empty string');
    if (value.role !== 'user' && value.role !== 'agent') throw A2AError.invalidParams('message.role must be "user" or "agent"');
    if (!Array.isArray(value.parts) || value.parts.length === 0) {
      throw A2AError.invalidParams('message.parts must be a non-empty array');
    }
    const taskId = PayloadValidator.optionalId(value.taskId, 'message.taskId');
    const contextId = PayloadValidator.optionalId(value.contextId, 'message.contextId');
    const final = value.final;
    if (final !== undefined && typeof final !== 'boolean') {
      throw A2AError.invalidParams('message.final must be a boolean');
    }

    return {
      kind: 'message',
      messageId: value.messageId,
      role: value.role,
      parts: value.parts.map((p) => PayloadValidator.parsePart(p)),
      ...(taskId !== undefined ? { taskId } : {}),
      ...(contextId !== undefined ? { contextId } : {}),
      ...(final !== undefined ? { final } : {}),
    };
  }

  static parseMessageSendParams(value: unknown): MessageSendParams {
    if (!isObject(value)) throw A2AError.invalidParams('params must be an object');
    const message = PayloadValidator.parseMessage(value.message);
    if (message.role !== 'user') throw A2AError.invalidParams('Only user messages can be sent to an agent');
    const historyLength = PayloadValidator.parseHistoryLength(value.historyLength);
    const metadata = value.metadata;
    if (metadata !== undefined && !isObject(metadata)) {
      throw A2AError.invalidParams('metadata must be an object');
    }
    return {
      message,
      ...(historyLength !== undefined ? { historyLength } : {}),
      ...(metadata !== undefined ? { metadata } : {}),
    };
  }

  static parseTaskQueryParams(value: unknown): TaskQueryParams {
    const { taskId } = PayloadValidator.parseTaskIdParams(value);
    const historyLength = isObject(value) ? PayloadValidator.parseHistoryLength(value.historyLength) : undefined;
    return { taskId, ...(historyLength !== undefined ? { historyLength } : {}) };
  }

  static parseTaskIdParams(value: unknown): TaskIdParams {
    if (!isObject(value)) throw A2AError.invalidParams('params must be an object');
    if (!isNonEmptyString(value.taskId)) throw A2AError.invalidParams('taskId must be a non-empty string');
    return { taskId: value.taskId };
  }

  private static optionalId(value: unknown, field: string): string | undefined {
    if (value === undefined) return undefined;
    if (!isNonEmptyString(value)) throw A2AError.invalidParams(`${field} must be a non-empty string`);
    return value;
  }

  private static parseHistoryLength(value: unknown): number | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw A2AError.invalidParams('historyLength must be a non-negative integer');
    }
    return value;
  }

  // ---------- guards over trusted-shape data ----------

  static isMessage(value: unknown): value is Message {
    try {
      PayloadValidator.parseMessage(value);
      return isObject(value) && value.kind === 'message';
    } catch {
      return false;
    }
  }

  static isArtifact(value: unknown): value is Artifact {
    if (!isObject(value)) return false;
    if (!isNonEmptyString(value.artifactId) || !Array.isArray(value.parts)) return false;
    if (value.lastChunk !== undefined && typeof value.lastChunk !== 'boolean') return false;
    try {
      value.parts.forEach((p) => PayloadValidator.parsePart(p));
      return true;
    } catch {
      return false;
    }
  }

  static isTaskStatus(value: unknown): value is TaskStatus {
    if (!isObject(value)) return false;
    if (typeof value.state !== 'string' || !TASK_STATES.has(value.state)) return false;
    if (typeof value.timestamp !== 'string') return false;
    return value.message === undefined || PayloadValidator.isMessage(value.message);
  }

  static isTask(value: unknown): value is Task {
    if (!isObject(value)) return false;
    return (
      value.kind === 'task' &&
      isNonEmptyString(value.id) &&
      isNonEmptyString(value.contextId) &&
      PayloadValidator.isTaskStatus(value.status) &&
      Array.isArray(value.history) &&
      value.history.every((m) => PayloadValidator.isMessage(m)) &&
      Array.isArray(value.artifacts) &&
      value.artifacts.every((a) => PayloadValidator.isArtifact(a)) &&
      (value.metadata === undefined || isObject(value.metadata))
    );
  }

  static isTaskEvent(value: unknown): value is TaskEvent {
    if (!isObject(value)) return false;
    if (!isNonEmptyString(value.taskId) || !isNonEmptyString(value.contextId)) return false;
    if (value.type === 'status-update') {
      return typeof value.final === 'boolean' && PayloadValidator.isTaskStatus(value.status);
    }
    if (value.type === 'artifact-update') {
      return typeof value.lastChunk === 'boolean' && PayloadValidator.isArtifact(value.artifact);
    }
    return false;
  }

  static isErrorObject(value: unknown): value is ErrorObject {
    return (
      isObject(value) &&
      typeof value.code === 'number' &&
      typeof value.message === 'string' &&
      (value.data === undefined || isObject(value.data))
    );
  }

  static isJsonRpcResponse(value: unknown): value is JsonRpcResponse {
    if (!isObject(value) || value.jsonrpc !== '2.0' || !PayloadValidator.isJsonRpcId(value.id)) return false;
    if ('error' in value) return PayloadValidator.isErrorObject(value.error);
    return 'result' in value;
  }

  // ---------- discovery documents ----------

  static isSkill(value: unknown): value is Skill {
    return (
      isObject(value) &&
      isNonEmptyString(value.id) &&
      isNonEmptyString(value.name) &&
      typeof value.description === 'string' &&
      isStringArray(value.tags) &&
      (value.examples === undefined || isStringArray(value.examples)) &&
      (value.inputModes === undefined || isStringArray(value.inputModes)) &&
      (value.outputModes === undefined || isStringArray(value.outputModes))
    );
  }

  static isCapabilities(value: unknown): value is Capabilities {
    if (!isObject(value)) return false;
    return ['streaming', 'pushNotifications', 'stateTransitionHistory'].every(
      (flag) => value[flag] === undefined || typeof value[flag] === 'boolean',
    );
  }

  static isAgentCard(value: unknown): value is AgentCard {
    return (
      isObject(value) &&
      isNonEmptyString(value.name) &&
      typeof value.description === 'string' &&
      isNonEmptyString(value.url) &&
      isNonEmptyString(value.version) &&
      optionalString(value.protocolVersion) &&
      PayloadValidator.isCapabilities(value.capabilities) &&
      Array.isArray(value.skills) &&
      value.skills.every((s) => PayloadValidator.isSkill(s)) &&
      isStringArray(value.defaultInputModes) &&
      isStringArray(value.defaultOutputModes) &&
      optionalString(value.iconUrl) &&
      optionalString(value.documentationUrl) &&
      (value.provider === undefined || isObject(value.provider))
    );
  }

  static isSignedAgentCard(value: unknown): value is SignedAgentCard {
    return (
      isObject(value) &&
      PayloadValidator.isAgentCard(value.card) &&
      typeof value.sig === 'string' &&
      HEX_128.test(value.sig) &&
      typeof value.publicKey === 'string' &&
      HEX_64.test(value.publicKey) &&
      typeof value.timestamp === 'number' &&
      Number.isInteger(value.timestamp)
    );
  }

  /** Accept a bare card, or the card inside a signed wrapper without checking its signature. */
  static parseAgentCard(value: unknown): AgentCard {
    if (PayloadValidator.isSignedAgentCard(value)) return value.card;
    if (PayloadValidator.isAgentCard(value)) return value;
    throw A2AError.agentCardInvalid('document is not an agent card');
  }
}
