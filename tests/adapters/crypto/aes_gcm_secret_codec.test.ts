import { describe, expect, it } from 'vitest';
import { AesGcmSecretCodec } from '../../../src/adapters/crypto/aes_gcm_secret_codec';
import { KeyDecryptionFailedError } from '../../../src/domain/errors';

describe('AesGcmSecretCodec', () => {
  const plaintext = Uint8Array.from({ length: 32 }, (_, index) => index);

  it('decrypts what it encrypted', () => {
    const codec = new AesGcmSecretCodec('test-secret');

    expect(codec.decrypt(codec.encrypt(plaintext))).toEqual(plaintext);
  });

  it('writes a base64 JSON envelope with fresh salt and iv', () => {
    const codec = new AesGcmSecretCodec('test-secret');
    const first = codec.encrypt(plaintext);
    const envelope: unknown = JSON.parse(Buffer.from(first, 'base64').toString('utf8'));

    expect(envelope).toMatchObject({ version: 1, algorithm: 'aes-256-gcm', kdf: 'scrypt' });
    expect(codec.encrypt(plaintext)).not.toBe(first);
  });

  it('fails with KeyDecryptionFailed under the wrong passphrase', () => {
    const encrypted = new AesGcmSecretCodec('test-secret').encrypt(plaintext);
    const other = new AesGcmSecretCodec('other-secret');

    expect(() => other.decrypt(encrypted)).toThrowError(KeyDecryptionFailedError);
    expect(() => other.decrypt(encrypted)).toThrowError(/Secret decryption failed/);
  });

  it('rejects malformed envelopes', () => {
    const codec = new AesGcmSecretCodec('test-secret');
    const wrongVersion = Buffer.from(JSON.stringify({ version: 2 }), 'utf8').toString('base64');

    expect(() => codec.decrypt('not-an-envelope')).toThrowError(
      'Encrypted secret is not a base64 JSON envelope'
    );
    expect(() => codec.decrypt(wrongVersion)).toThrowError(/Invalid encrypted secret envelope/);
  });

  it('requires a passphrase', () => {
    expect(() => new AesGcmSecretCodec('')).toThrowError('Secret codec passphrase must not be empty');
  });
});
