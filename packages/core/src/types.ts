/**
 * Core value and hook types for shelfdb
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Serialization hook. Turns a value into the payload stored in the
 * `value` column and back.
 */
export interface ValueCodec {
  encode(value: JsonValue): string;
  decode(payload: string): JsonValue;
}

/**
 * Encryption hook, applied to the encoded payload before it reaches storage
 */
export interface ValueCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}

export const jsonCodec: ValueCodec = {
  encode: (value) => JSON.stringify(value),
  decode: (payload) => {
    const value: JsonValue = JSON.parse(payload);
    return value;
  },
};

/**
 * Calculate the nesting depth of a value (scalars are depth 0)
 */
export function calculateValueDepth(value: JsonValue): number {
  if (Array.isArray(value)) {
    return 1 + Math.max(0, ...value.map((item) => calculateValueDepth(item)));
  }
  if (value !== null && typeof value === 'object') {
    return 1 + Math.max(0, ...Object.values(value).map((item) => calculateValueDepth(item)));
  }
  return 0;
}
