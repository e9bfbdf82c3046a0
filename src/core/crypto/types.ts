// src/core/crypto/types.ts

/**
 * Symmetric cipher applied to every frame of a channel.
 * Both peers must be configured with the same type and key material.
 */
export interface CipherPlugin {
    readonly type: string;
    encrypt(plaintext: Uint8Array): Buffer;
    decrypt(ciphertext: Uint8Array): Buffer;
}

export type BuiltinCipherType = 'xor' | 'aes-cbc' | 'aes-gcm';

export interface CipherConfig {
    type: string;
    params: Record<string, unknown>;
}

export type CipherFactory = (params: Record<string, unknown>) => CipherPlugin;
