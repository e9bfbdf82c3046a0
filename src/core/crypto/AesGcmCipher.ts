// src/core/crypto/AesGcmCipher.ts

import * as crypto from 'crypto';
import type { CipherGCMTypes } from 'crypto';
import { z } from 'zod';
import { CipherPlugin } from './types';
import { CryptoError } from '../errors';
import {
    AES_KEY_LENGTHS,
    GCM_NONCE_LENGTH,
    GCM_TAG_LENGTH,
    base64String,
    decodeKeyMaterial,
    parseCipherParams,
} from './params';

const aesGcmParamsSchema = z.object({
    key: base64String,
    nonce: base64String,
});

const GCM_ALGORITHMS: Record<number, CipherGCMTypes> = {
    16: 'aes-128-gcm',
    24: 'aes-192-gcm',
    32: 'aes-256-gcm',
};

/**
 * AES-GCM producing `ciphertext || tag`.
 *
 * The nonce is fixed for the lifetime of the channel, so two messages
 * encrypted under the same configuration share a keystream.
 */
export class AesGcmCipher implements CipherPlugin {
    public readonly type = 'aes-gcm';
    private readonly key: Buffer;
    private readonly nonce: Buffer;
    private readonly algorithm: CipherGCMTypes;

    constructor(params: Record<string, unknown>) {
        const parsed = parseCipherParams(aesGcmParamsSchema, params, this.type);
        this.key = decodeKeyMaterial(parsed.key, 'key', AES_KEY_LENGTHS, this.type);
        this.nonce = decodeKeyMaterial(parsed.nonce, 'nonce', [GCM_NONCE_LENGTH], this.type);
        this.algorithm = GCM_ALGORITHMS[this.key.length];
    }

    public encrypt(plaintext: Uint8Array): Buffer {
        const cipher = crypto.createCipheriv(this.algorithm, this.key, this.nonce, { authTagLength: GCM_TAG_LENGTH });
        const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
        return Buffer.concat([ciphertext, cipher.getAuthTag()]);
    }

    public decrypt(data: Uint8Array): Buffer {
        if (data.length < GCM_TAG_LENGTH) {
            throw new CryptoError(`AES-GCM input of ${data.length} bytes is shorter than the authentication tag`, {
                operation: 'decrypt',
            });
        }

        const tag = data.subarray(data.length - GCM_TAG_LENGTH);
        const ciphertext = data.subarray(0, data.length - GCM_TAG_LENGTH);

        const decipher = crypto.createDecipheriv(this.algorithm, this.key, this.nonce, { authTagLength: GCM_TAG_LENGTH });
        decipher.setAuthTag(tag);
        try {
            return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
        } catch (error) {
            throw new CryptoError('AES-GCM authentication failed', {
                operation: 'decrypt',
                details: error instanceof Error ? error.message : String(error),
            });
        }
    }
}
