export { CipherRegistry, createCipherFromSource } from './CipherRegistry';
export { XorCipher } from './XorCipher';
export { AesCbcCipher } from './AesCbcCipher';
export { AesGcmCipher } from './AesGcmCipher';
export type { BuiltinCipherType, CipherConfig, CipherFactory, CipherPlugin } from './types';
