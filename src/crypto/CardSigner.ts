import { createRequire } from 'module';
import { schnorr } from '@noble/curves/secp256k1.js';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { A2AError } from '../errors/A2AError.js';
import type { AgentCard, SignedAgentCard } from '../types/agent-card.js';
import type { PrivateKeyHex, PublicKeyXOnly } from '../types/keys.js';

const require = createRequire(import.meta.url);
const canonicalizeFn = require('canonicalize') as (input: unknown) => string | undefined;

export interface CardSignOptions {
  /** Unix seconds to sign at (default: now). */
  timestamp?: number;
  /** Auxiliary randomness for Schnorr signing. Defaults to 32 zero bytes (deterministic). */
  auxRand?: Uint8Array;
}

/** BIP-340 Schnorr signing of agent cards for serving over unauthenticated channels. */
export class CardSigner {
  /**
   * Canonicalize a JSON-serializable object per RFC 8785 (JCS).
   * @throws A2AError if the input cannot be serialized.
   */
  static canonicalize(obj: unknown): string {
    const result = canonicalizeFn(obj);
    if (result === undefined) {
      throw A2AError.agentCardInvalid('card cannot be canonicalized');
    }
    return result;
  }

  /** `canonicalize(card) + "|" + timestamp` */
  static buildSignatureInput(card: AgentCard, timestamp: number): string {
    return `${CardSigner.canonicalize(card)}|${timestamp}`;
  }

  /** Hash the UTF-8 encoded signature input with SHA-256. */
  static hashSignatureInput(signatureInput: string): Uint8Array {
    return sha256(new TextEncoder().encode(signatureInput));
  }

  /** x-only public key (64 hex chars) of a private key. */
  static getPublicKey(privateKey: PrivateKeyHex): PublicKeyXOnly {
    return bytesToHex(schnorr.getPublicKey(hexToBytes(privateKey)));
  }

  static generatePrivateKey(): PrivateKeyHex {
    return bytesToHex(schnorr.utils.randomPrivateKey());
  }

  static sign(card: AgentCard, privateKey: PrivateKeyHex, options?: CardSignOptions): SignedAgentCard {
    const timestamp = options?.timestamp ?? Math.floor(Date.now() / 1000);
    const hash = CardSigner.hashSignatureInput(CardSigner.buildSignatureInput(card, timestamp));
    const auxRand = options?.auxRand ?? new Uint8Array(32);
    const sig = bytesToHex(schnorr.sign(hash, hexToBytes(privateKey), auxRand));
    return { card, sig, publicKey: CardSigner.getPublicKey(privateKey), timestamp };
  }

  /** Check the signature of a signed card against the key it names. */
  static verify(signed: SignedAgentCard): boolean {
    try {
      const hash = CardSigner.hashSignatureInput(CardSigner.buildSignatureInput(signed.card, signed.timestamp));
      return schnorr.verify(hexToBytes(signed.sig), hash, hexToBytes(signed.publicKey));
    } catch {
      return false;
    }
  }
}
