import { describe, it, expect } from "vitest";
import { createLogger } from "./logger";

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("createLogger", () => {
  it("should write structured entries tagged with the service", () => {
    const stream = capture();
    const logger = createLogger({ level: "info" }, stream);

    logger.info({ accountNumber: "11111111" }, "account created");

    const entry = JSON.parse(stream.lines[0]);
    expect(entry).toMatchObject({
      level: 30,
      service: "bank-ledger",
      accountNumber: "11111111",
      msg: "account created",
    });
    expect(typeof entry.time).toBe("string");
  });

  it("should redact PINs and PIN hashes", () => {
    const stream = capture();
    const logger = createLogger({ level: "info" }, stream);

    logger.info({ pin: "1234", account: { accountNumber: "11111111", pinHash: "scrypt$x" } }, "redacted");

    const entry = JSON.parse(stream.lines[0]);
    expect(entry.pin).toBe("[REDACTED]");
    expect(entry.account).toEqual({ accountNumber: "11111111", pinHash: "[REDACTED]" });
  });

  it("should drop entries below the configured level", () => {
    const stream = capture();
    const logger = createLogger({ level: "warn" }, stream);

    logger.info("ignored");
    logger.warn("kept");

    expect(stream.lines).toHaveLength(1);
    expect(JSON.parse(stream.lines[0]).msg).toBe("kept");
  });
});
