import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator } from '../messaging/PayloadValidator.js';
import type { AgentCard, AgentCardVerifier } from '../types/agent-card.js';
import type { PublicKeyXOnly } from '../types/keys.js';
import { CardSigner } from './CardSigner.js';

export interface SchnorrCardVerifierConfig {
  /** Signer keys whose cards are accepted. */
  trustedKeys: PublicKeyXOnly[];
  /** Reject signatures older than this many seconds (default: no limit). */
  maxAgeSeconds?: number;
  /** Allowed clock skew for signatures dated in the future, in seconds (default: 300). */
  maxSkewSeconds?: number;
  /** Clock used for the age check (default: the system clock). */
  now?: () => Date;
}

/** Accepts only signed cards from a trusted key, with a valid and recent signature. */
export class SchnorrCardVerifier implements AgentCardVerifier {
  private readonly trustedKeys: ReadonlySet<string>;
  private readonly maxAgeSeconds?: number;
  private readonly maxSkewSeconds: number;
  private readonly now: () => Date;

  constructor(config: SchnorrCardVerifierConfig) {
    this.trustedKeys = new Set(config.trustedKeys.map((key) => key.toLowerCase()));
    this.maxAgeSeconds = config.maxAgeSeconds;
    this.maxSkewSeconds = config.maxSkewSeconds ?? 300;
    this.now = config.now ?? (() => new Date());
  }

  async verify(document: unknown): Promise<AgentCard> {
    if (!PayloadValidator.isSignedAgentCard(document)) {
      throw A2AError.agentCardInvalid('document is not a signed agent card');
    }
    if (!this.trustedKeys.has(document.publicKey)) {
      throw A2AError.agentCardInvalid(`signer ${document.publicKey} is not trusted`);
    }

    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    if (document.timestamp - nowSeconds > this.maxSkewSeconds) {
      throw A2AError.agentCardInvalid('signature timestamp is in the future');
    }
    if (this.maxAgeSeconds !== undefined && nowSeconds - document.timestamp > this.maxAgeSeconds) {
      throw A2AError.agentCardInvalid('signature has expired');
    }

    if (!CardSigner.verify(document)) {
      throw A2AError.agentCardInvalid('signature verification failed');
    }
    return document.card;
  }
}
