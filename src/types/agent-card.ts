import type { PublicKeyXOnly, SchnorrSignatureHex } from './keys.js';
import type { MediaType } from './part.js';

/** A capability that the agent provides. */
export interface Skill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
  inputModes?: MediaType[];
  outputModes?: MediaType[];
}

/** Optional feature flags for an agent. */
export interface Capabilities {
  streaming?: boolean;
  pushNotifications?: boolean;
  stateTransitionHistory?: boolean;
}

/** Organization operating the agent. */
export interface Provider {
  organization?: string;
  url?: string;
}

/**
 * Discovery document: describes an agent's identity, capabilities, and where
 * to reach it. Advisory only; nothing in it is authenticated on its own.
 */
export interface AgentCard {
  name: string;
  description: string;
  url: string;
  version: string;
  protocolVersion?: string;
  capabilities: Capabilities;
  skills: Skill[];
  defaultInputModes: MediaType[];
  defaultOutputModes: MediaType[];
  provider?: Provider;
  iconUrl?: string;
  documentationUrl?: string;
}

/**
 * A signed wrapper for serving AgentCards over unauthenticated channels.
 * The signature lets clients check where a card came from without TLS trust.
 */
export interface SignedAgentCard {
  card: AgentCard;
  /** Schnorr signature over SHA-256(canonicalize(card) + "|" + timestamp). */
  sig: SchnorrSignatureHex;
  /** x-only public key (64 hex chars) of the signer. */
  publicKey: PublicKeyXOnly;
  /** Unix timestamp (seconds) when the card was signed. */
  timestamp: number;
}

/** Seam for checking a fetched discovery document before it is trusted. */
export interface AgentCardVerifier {
  /** Resolve to the card when the document passes, reject with `A2AError` otherwise. */
  verify(document: unknown): Promise<AgentCard>;
}
