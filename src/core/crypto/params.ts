// src/core/crypto/params.ts

import { z } from 'zod';
import { ConfigurationError } from '../errors';

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const AES_KEY_LENGTHS = [16, 24, 32] as const;
export const AES_BLOCK_SIZE = 16;
export const CBC_IV_LENGTH = 16;
export const GCM_NONCE_LENGTH = 12;
export const GCM_TAG_LENGTH = 16;

export const base64String = z.string().min(1).regex(BASE64_REGEX, 'must be a base64 string');

/**
 * Validates cipher params against a schema, mapping zod issues to a ConfigurationError.
 */
export function parseCipherParams<T extends z.ZodTypeAny>(
    schema: T,
    params: Record<string, unknown>,
    cipherType: string
): z.infer<T> {
    const result = schema.safeParse(params);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || 'params'}: ${i.message}`);
        throw new ConfigurationError(`Invalid ${cipherType} parameters: ${issues.join('; ')}`, {
            operation: 'createCipher',
            details: { cipherType, issues },
        });
    }
    return result.data;
}

/**
 * Decodes base64 key material and checks its length against the allowed set.
 */
export function decodeKeyMaterial(
    value: string,
    field: string,
    allowedLengths: readonly number[],
    cipherType: string
): Buffer {
    const decoded = Buffer.from(value, 'base64');
    if (!allowedLengths.includes(decoded.length)) {
        throw new ConfigurationError(
            `Invalid ${cipherType} ${field} length: ${decoded.length} bytes (expected ${allowedLengths.join('/')})`,
            { operation: 'createCipher', details: { cipherType, field, length: decoded.length } }
        );
    }
    return decoded;
}
