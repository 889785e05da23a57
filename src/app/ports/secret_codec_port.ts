export interface SecretCodecPort {
  encrypt(plaintext: Uint8Array): string;
  /** Throws KeyDecryptionFailedError when the envelope is corrupt or the key is wrong. */
  decrypt(encryptedSecret: string): Uint8Array;
}
