import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { z } from 'zod';
import type { SecretCodecPort } from '../../app/ports/secret_codec_port';
import { KeyDecryptionFailedError } from '../../domain/errors';

const envelopeSchema = z
  .object({
    version: z.literal(1),
    algorithm: z.literal('aes-256-gcm'),
    kdf: z.literal('scrypt'),
    salt_base64: z.string().min(1),
    iv_base64: z.string().min(1),
    auth_tag_base64: z.string().min(1),
    ciphertext_base64: z.string().min(1)
  })
  .strict();

export type SecretEnvelope = z.infer<typeof envelopeSchema>;

function deriveKey(passphrase: string, salt: Buffer): Buffer {
  return scryptSync(passphrase, salt, 32);
}

function parseEnvelope(encryptedSecret: string): SecretEnvelope {
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(encryptedSecret, 'base64').toString('utf8'));
  } catch {
    throw new KeyDecryptionFailedError('Encrypted secret is not a base64 JSON envelope');
  }

  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new KeyDecryptionFailedError(`Invalid encrypted secret envelope: ${parsed.error.message}`);
  }

  return parsed.data;
}

/**
 * AES-256-GCM with a scrypt key per envelope. The passphrase is bound once at construction;
 * envelopes are base64 of the JSON wallet-file format.
 */
export class AesGcmSecretCodec implements SecretCodecPort {
  constructor(private readonly passphrase: string) {
    if (passphrase.length === 0) {
      throw new Error('Secret codec passphrase must not be empty');
    }
  }

  encrypt(plaintext: Uint8Array): string {
    const salt = randomBytes(16);
    const iv = randomBytes(12);
    const cipher = createCipheriv('aes-256-gcm', deriveKey(this.passphrase, salt), iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    const envelope: SecretEnvelope = {
      version: 1,
      algorithm: 'aes-256-gcm',
      kdf: 'scrypt',
      salt_base64: salt.toString('base64'),
      iv_base64: iv.toString('base64'),
      auth_tag_base64: cipher.getAuthTag().toString('base64'),
      ciphertext_base64: ciphertext.toString('base64')
    };

    return Buffer.from(JSON.stringify(envelope), 'utf8').toString('base64');
  }

  decrypt(encryptedSecret: string): Uint8Array {
    const envelope = parseEnvelope(encryptedSecret);
    const salt = Buffer.from(envelope.salt_base64, 'base64');
    const iv = Buffer.from(envelope.iv_base64, 'base64');

    try {
      const decipher = createDecipheriv('aes-256-gcm', deriveKey(this.passphrase, salt), iv);
      decipher.setAuthTag(Buffer.from(envelope.auth_tag_base64, 'base64'));
      const plaintext = Buffer.concat([
        decipher.update(Buffer.from(envelope.ciphertext_base64, 'base64')),
        decipher.final()
      ]);
      return new Uint8Array(plaintext);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new KeyDecryptionFailedError(`Secret decryption failed: ${reason}`);
    }
  }
}
