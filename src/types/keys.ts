export type HexString = string;

/** 64 hex characters representing a 32-byte x-only public key. */
export type PublicKeyXOnly = HexString;

/** 64 hex characters representing a 32-byte private key. */
export type PrivateKeyHex = HexString;

/** 128 hex characters representing a 64-byte Schnorr signature. */
export type SchnorrSignatureHex = HexString;
