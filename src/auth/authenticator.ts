/**
 * Handshake authentication
 *
 * - Authenticator: the sign/verify capability that binds a handshake to an identity
 * - MlDsaAuthenticator: ML-DSA-65 reference implementation
 * - TrustPolicy: which peer identities are accepted
 * - ML-KEM-1024 helpers for the authenticated secret
 */

import { ml_dsa65 } from '@noble/post-quantum/ml-dsa.js';
import { sha3_256 } from '@noble/hashes/sha3';
import { randomBytes } from '@noble/hashes/utils';
import { MlKem1024 } from 'crystals-kyber-js';
import { bytesToHex, constantTimeEquals } from '../crypto/utils.js';

export interface Authenticator {
  /** Public identity sent to the peer (an ML-DSA public key for the reference implementation) */
  readonly identity: Uint8Array;
  sign(message: Uint8Array): Promise<Uint8Array>;
  verify(identity: Uint8Array, message: Uint8Array, signature: Uint8Array): Promise<boolean>;
}

export class MlDsaAuthenticator implements Authenticator {
  private constructor(
    readonly identity: Uint8Array,
    private readonly secretKey: Uint8Array,
  ) {}

  /**
   * Fresh keypair; a 32-byte seed makes it reproducible
   */
  static generate(seed?: Uint8Array): MlDsaAuthenticator {
    const { publicKey, secretKey } = ml_dsa65.keygen(seed ?? randomBytes(32));
    return new MlDsaAuthenticator(publicKey, secretKey);
  }

  async sign(message: Uint8Array): Promise<Uint8Array> {
    return ml_dsa65.sign(this.secretKey, message);
  }

  async verify(identity: Uint8Array, message: Uint8Array, signature: Uint8Array): Promise<boolean> {
    try {
      return ml_dsa65.verify(identity, message, signature);
    } catch {
      // Malformed keys or signatures are a failed verification
      return false;
    }
  }
}

/**
 * Short identity fingerprint for logs: first 8 bytes of SHA3-256(identity)
 */
export function fingerprint(identity: Uint8Array): string {
  return bytesToHex(sha3_256(identity).slice(0, 8));
}

// ============================================================================
// Trust policy
// ============================================================================

export interface TrustPolicy {
  /** Decide whether a peer identity may complete the handshake */
  accepts(identity: Uint8Array): boolean;
}

/**
 * Accept only the listed identities
 */
export class PinnedTrust implements TrustPolicy {
  private readonly pinned: Uint8Array[];

  constructor(identities: Uint8Array[]) {
    this.pinned = identities.map(identity => Uint8Array.from(identity));
  }

  accepts(identity: Uint8Array): boolean {
    return this.pinned.some(pinned => constantTimeEquals(pinned, identity));
  }
}

/**
 * Accept the first identity seen, then only that identity
 */
export class TrustOnFirstUse implements TrustPolicy {
  private remembered: Uint8Array | null = null;

  accepts(identity: Uint8Array): boolean {
    if (this.remembered === null) {
      this.remembered = Uint8Array.from(identity);
      return true;
    }
    return constantTimeEquals(this.remembered, identity);
  }

  get pinnedIdentity(): Uint8Array | null {
    return this.remembered;
  }
}

// ============================================================================
// ML-KEM-1024
// ============================================================================

export interface KemKeypair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

export interface KemEncapsulation {
  ciphertext: Uint8Array;
  sharedSecret: Uint8Array;
}

export async function generateKemKeypair(): Promise<KemKeypair> {
  const kem = new MlKem1024();
  const [publicKey, secretKey] = await kem.generateKeyPair();
  return { publicKey, secretKey };
}

export async function kemEncapsulate(peerPublicKey: Uint8Array): Promise<KemEncapsulation> {
  const kem = new MlKem1024();
  const [ciphertext, sharedSecret] = await kem.encap(peerPublicKey);
  return { ciphertext, sharedSecret };
}

export async function kemDecapsulate(ciphertext: Uint8Array, secretKey: Uint8Array): Promise<Uint8Array> {
  const kem = new MlKem1024();
  return kem.decap(ciphertext, secretKey);
}
