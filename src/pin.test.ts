import { describe, it, expect } from "vitest";
import { hashPin, isValidHashCost, isValidPinFormat, verifyPin } from "./pin";

describe("pin", () => {
  it("should accept exactly four digits", () => {
    expect(isValidPinFormat("0000")).toBe(true);
    expect(isValidPinFormat("1234")).toBe(true);
    expect(isValidPinFormat("123")).toBe(false);
    expect(isValidPinFormat("12345")).toBe(false);
    expect(isValidPinFormat("12a4")).toBe(false);
  });

  it("should accept only powers of two as hash cost", () => {
    expect(isValidHashCost(1024)).toBe(true);
    expect(isValidHashCost(16384)).toBe(true);
    expect(isValidHashCost(1)).toBe(false);
    expect(isValidHashCost(1000)).toBe(false);
    expect(isValidHashCost(1024.5)).toBe(false);
  });

  it("should store the cost with a salted hash", async () => {
    const first = await hashPin("1234", 1024);
    const second = await hashPin("1234", 1024);

    expect(first.startsWith("scrypt$1024$")).toBe(true);
    expect(first.split("$")).toHaveLength(4);
    expect(first).not.toBe(second);
  });

  it("should verify only the hashed PIN", async () => {
    const pinHash = await hashPin("4321", 1024);

    expect(await verifyPin("4321", pinHash)).toBe(true);
    expect(await verifyPin("4322", pinHash)).toBe(false);
  });

  it("should reject malformed hashes", async () => {
    expect(await verifyPin("1234", "1234")).toBe(false);
    expect(await verifyPin("1234", "bcrypt$1024$c2FsdA==$a2V5")).toBe(false);
    expect(await verifyPin("1234", "scrypt$1000$c2FsdA==$a2V5")).toBe(false);
    expect(await verifyPin("1234", "scrypt$1024$$")).toBe(false);
  });
});
