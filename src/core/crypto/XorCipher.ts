// src/core/crypto/XorCipher.ts

import { z } from 'zod';
import { CipherPlugin } from './types';
import { parseCipherParams } from './params';

const xorParamsSchema = z.object({
    byte: z.number().int().min(0).max(255),
});

/**
 * Single-byte XOR. Encrypt and decrypt are the same involution.
 * Obfuscation only; offers no confidentiality.
 */
export class XorCipher implements CipherPlugin {
    public readonly type = 'xor';
    private readonly key: number;

    constructor(params: Record<string, unknown>) {
        this.key = parseCipherParams(xorParamsSchema, params, 'xor').byte;
    }

    public encrypt(plaintext: Uint8Array): Buffer {
        return this.apply(plaintext);
    }

    public decrypt(ciphertext: Uint8Array): Buffer {
        return this.apply(ciphertext);
    }

    private apply(data: Uint8Array): Buffer {
        const out = Buffer.allocUnsafe(data.length);
        for (let i = 0; i < data.length; i++) {
            out[i] = data[i] ^ this.key;
        }
        return out;
    }
}
