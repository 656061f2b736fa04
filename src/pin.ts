/**
 * PIN hashing and verification.
 * Uses Node's built-in scrypt; the cost parameter is stored with each hash so
 * it can be raised without invalidating existing PINs.
 */
import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

export const PIN_PATTERN = /^\d{4}$/;
export const DEFAULT_PIN = "0000";
export const DEFAULT_PIN_HASH_COST = 16384;

const KEY_LENGTH = 32;
const SALT_LENGTH = 16;

function deriveKey(pin: string, salt: Buffer, cost: number, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(pin, salt, length, { N: cost }, (error, key) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });
}

export function isValidPinFormat(pin: string): boolean {
  return PIN_PATTERN.test(pin);
}

export function isValidHashCost(cost: number): boolean {
  return Number.isInteger(cost) && cost > 1 && (cost & (cost - 1)) === 0;
}

/**
 * Hash a PIN as `scrypt$<cost>$<salt>$<key>` with base64 salt and key.
 */
export async function hashPin(pin: string, cost = DEFAULT_PIN_HASH_COST): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const key = await deriveKey(pin, salt, cost, KEY_LENGTH);
  return `scrypt$${cost}$${salt.toString("base64")}$${key.toString("base64")}`;
}

export async function verifyPin(pin: string, pinHash: string): Promise<boolean> {
  const parts = pinHash.split("$");
  if (parts.length !== 4 || parts[0] !== "scrypt") {
    return false;
  }

  const [, costText, saltText, keyText] = parts;
  const cost = Number.parseInt(costText, 10);
  if (!isValidHashCost(cost) || !saltText || !keyText) {
    return false;
  }

  const storedKey = Buffer.from(keyText, "base64");
  const derivedKey = await deriveKey(pin, Buffer.from(saltText, "base64"), cost, storedKey.length);
  return timingSafeEqual(storedKey, derivedKey);
}
