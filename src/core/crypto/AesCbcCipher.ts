// src/core/crypto/AesCbcCipher.ts

import * as crypto from 'crypto';
import { z } from 'zod';
import { CipherPlugin } from './types';
import { CryptoError } from '../errors';
import {
    AES_BLOCK_SIZE,
    AES_KEY_LENGTHS,
    CBC_IV_LENGTH,
    base64String,
    decodeKeyMaterial,
    parseCipherParams,
} from './params';

const aesCbcParamsSchema = z.object({
    key: base64String,
    iv: base64String,
});

/**
 * AES-CBC with PKCS#7 padding and a fixed per-channel IV.
 */
export class AesCbcCipher implements CipherPlugin {
    public readonly type = 'aes-cbc';
    private readonly key: Buffer;
    private readonly iv: Buffer;
    private readonly algorithm: string;

    constructor(params: Record<string, unknown>) {
        const parsed = parseCipherParams(aesCbcParamsSchema, params, this.type);
        this.key = decodeKeyMaterial(parsed.key, 'key', AES_KEY_LENGTHS, this.type);
        this.iv = decodeKeyMaterial(parsed.iv, 'iv', [CBC_IV_LENGTH], this.type);
        this.algorithm = `aes-${this.key.length * 8}-cbc`;
    }

    public encrypt(plaintext: Uint8Array): Buffer {
        const padLength = AES_BLOCK_SIZE - (plaintext.length % AES_BLOCK_SIZE);
        const padded = Buffer.concat([plaintext, Buffer.alloc(padLength, padLength)]);

        const cipher = crypto.createCipheriv(this.algorithm, this.key, this.iv);
        cipher.setAutoPadding(false);
        return Buffer.concat([cipher.update(padded), cipher.final()]);
    }

    public decrypt(ciphertext: Uint8Array): Buffer {
        if (ciphertext.length === 0 || ciphertext.length % AES_BLOCK_SIZE !== 0) {
            throw new CryptoError(`AES-CBC ciphertext length ${ciphertext.length} is not a positive multiple of ${AES_BLOCK_SIZE}`, {
                operation: 'decrypt',
            });
        }

        const decipher = crypto.createDecipheriv(this.algorithm, this.key, this.iv);
        decipher.setAutoPadding(false);
        const padded = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

        const padLength = padded[padded.length - 1];
        if (padLength < 1 || padLength > AES_BLOCK_SIZE) {
            throw new CryptoError(`Invalid AES-CBC padding byte ${padLength}`, { operation: 'decrypt' });
        }
        for (let i = padded.length - padLength; i < padded.length; i++) {
            if (padded[i] !== padLength) {
                throw new CryptoError('Inconsistent AES-CBC padding', { operation: 'decrypt' });
            }
        }

        return padded.subarray(0, padded.length - padLength);
    }
}
