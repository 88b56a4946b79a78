// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import {
  parsePort,
  validateBroadcastAddress,
  validateHardwareAddress,
  validateOctet,
  validatePort,
  validateTarget,
} from "../../src/validation/index.js";
import type { Result } from "../../src/outcome.js";

function detailOf(result: Result<unknown>): string | undefined {
  return result.ok ? undefined : result.detail;
}

// ── Hardware address ─────────────────────────────────────────────────────────

describe("validateHardwareAddress", () => {
  it.each(["A0-36-BC-BB-EB-CC", "a0-36-bc-bb-eb-cc", "00-11-22-aa-BB-cc", "FF-FF-FF-FF-FF-FF"])(
    "accepts %s",
    (mac) => {
      expect(validateHardwareAddress(mac).ok).toBe(true);
    },
  );

  it("rejects a colon separator", () => {
    const result = validateHardwareAddress("A0:36:BC:BB:EB:CC");
    expect(result).toEqual({
      ok: false,
      outcome: "InvalidHardwareAddress",
      detail: "MAC address separator at position 2 must be '-', got ':'",
    });
  });

  it("rejects a space separator", () => {
    expect(detailOf(validateHardwareAddress("A0 36 BC BB EB CC"))).toBe(
      "MAC address separator at position 2 must be '-', got ' '",
    );
  });

  it("rejects the empty string on length", () => {
    expect(detailOf(validateHardwareAddress(""))).toBe("MAC address has an invalid length (0)");
  });

  it("checks length before characters", () => {
    expect(detailOf(validateHardwareAddress("ZZ-36-BC-BB-EB-CC-D"))).toBe("MAC address has an invalid length (19)");
  });

  it("reports the first invalid character only", () => {
    expect(detailOf(validateHardwareAddress("G0:36:BC:BB:EB:CC"))).toBe("MAC address contains an invalid character: 'G'");
  });

  it("rejects a non-hex digit", () => {
    const result = validateHardwareAddress("A0-36-BC-BB-EB-CG");
    expect(result.ok).toBe(false);
    expect(detailOf(result)).toBe("MAC address contains an invalid character: 'G'");
  });

  it("rejects a trailing separator within the 18-character limit", () => {
    expect(detailOf(validateHardwareAddress("A0-36-BC-BB-EB-CC-"))).toBe(
      "MAC address contains an invalid character: '-'",
    );
  });

  it("rejects fewer than six groups", () => {
    expect(detailOf(validateHardwareAddress("A0-36-BC"))).toBe(
      "MAC address must have six groups (expected 17 characters, got 8)",
    );
  });

  it("rejects separators in the wrong positions", () => {
    expect(validateHardwareAddress("A036-BCBB-EBCC-00").ok).toBe(false);
  });
});

// ── Broadcast address ────────────────────────────────────────────────────────

describe("validateBroadcastAddress", () => {
  it.each(["192.168.0.255", "255.255.255.255", "0.0.0.0", "10.0.0.1", "172.16.9.99"])("accepts %s", (address) => {
    expect(validateBroadcastAddress(address).ok).toBe(true);
  });

  it("accepts every octet boundary value without leading zeros", () => {
    const values = [0, 1, 9, 10, 99, 100, 199, 200, 249, 250, 255];
    for (const a of values) {
      for (const d of values) {
        expect(validateBroadcastAddress(`${a}.${d}.${a}.${d}`).ok).toBe(true);
      }
    }
  });

  it("rejects five groups", () => {
    expect(validateBroadcastAddress("192.168.0.1.255")).toEqual({
      ok: false,
      outcome: "InvalidBroadcastAddress",
      detail: "Broadcast address has more than 3 dots",
    });
  });

  it("rejects a leading zero", () => {
    expect(detailOf(validateBroadcastAddress("192.168.00.255"))).toBe("Broadcast address octet has a leading zero: '00'");
  });

  it.each(["01.2.3.4", "1.02.3.4", "1.2.003.4", "1.2.3.040"])("rejects the leading zero in %s", (address) => {
    expect(validateBroadcastAddress(address).ok).toBe(false);
  });

  it("rejects a trailing empty octet", () => {
    expect(detailOf(validateBroadcastAddress("1.2.3."))).toBe("Broadcast address octet has an invalid length: ''");
  });

  it("rejects a leading empty octet", () => {
    expect(detailOf(validateBroadcastAddress(".1.2.3"))).toBe("Broadcast address octet has an invalid length: ''");
  });

  it("rejects an empty octet in the middle", () => {
    expect(detailOf(validateBroadcastAddress("1..2.3"))).toBe("Broadcast address octet has an invalid length: ''");
  });

  it("rejects the empty string", () => {
    expect(detailOf(validateBroadcastAddress(""))).toBe("Broadcast address octet has an invalid length: ''");
  });

  it("rejects three octets", () => {
    expect(detailOf(validateBroadcastAddress("1.2.3"))).toBe("Broadcast address needs 3 dots, found 2");
  });

  it("rejects values above 255", () => {
    expect(detailOf(validateBroadcastAddress("256.1.1.1"))).toBe("Broadcast address octet out of range (0-255): 256");
  });

  it("rejects non-digit characters", () => {
    expect(detailOf(validateBroadcastAddress("1.2.3.4a"))).toBe(
      "Broadcast address octet contains an invalid character: 'a'",
    );
  });

  it("rejects an octet longer than three digits", () => {
    expect(detailOf(validateBroadcastAddress("1234.1.1.1"))).toBe("Broadcast address octet has an invalid length: '1234'");
  });

  it("stops at the first bad octet", () => {
    expect(detailOf(validateBroadcastAddress("300.x.1.1"))).toBe("Broadcast address octet out of range (0-255): 300");
  });
});

describe("validateOctet", () => {
  it("accepts a single zero", () => {
    expect(validateOctet("0").ok).toBe(true);
  });

  it("rejects a sign", () => {
    expect(detailOf(validateOctet("-1"))).toBe("Broadcast address octet contains an invalid character: '-'");
  });
});

// ── Port ─────────────────────────────────────────────────────────────────────

describe("validatePort", () => {
  it.each([1, 9, 7, 65_535])("accepts %d", (port) => {
    expect(validatePort(port).ok).toBe(true);
  });

  it.each([0, 65_536, -1, 9.5, Number.NaN])("rejects %d", (port) => {
    const result = validatePort(port);
    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.outcome).toBe("InvalidPort");
  });

  it("names the range in the diagnostic", () => {
    expect(detailOf(validatePort(0))).toBe("Port must be an integer between 1 and 65535, got 0");
  });
});

describe("parsePort", () => {
  it("parses plain digits", () => {
    expect(parsePort("9")).toEqual({ ok: true, value: 9 });
    expect(parsePort("65535")).toEqual({ ok: true, value: 65_535 });
  });

  it.each(["", "abc", "9abc", " 9", "9 ", "+9", "-9", "9.0", "0x10"])("rejects malformed text %j", (text) => {
    expect(detailOf(parsePort(text))).toBe(`Port is not a number: '${text}'`);
  });

  it("separates overflow from malformed text in the diagnostic only", () => {
    const result = parsePort("99999999999999999999");
    expect(result.ok ? undefined : result.outcome).toBe("InvalidPort");
    expect(detailOf(result)).toBe("Port is out of range: '99999999999999999999'");
  });

  it("rejects 0 and 65536 by range", () => {
    expect(detailOf(parsePort("0"))).toBe("Port must be an integer between 1 and 65535, got 0");
    expect(detailOf(parsePort("65536"))).toBe("Port must be an integer between 1 and 65535, got 65536");
  });
});

// ── Whole target ─────────────────────────────────────────────────────────────

describe("validateTarget", () => {
  const valid = { hardwareAddress: "A0-36-BC-BB-EB-CC", broadcastAddress: "192.168.0.255", port: 9 };

  it("accepts a valid target", () => {
    expect(validateTarget(valid).ok).toBe(true);
  });

  it("reports the hardware address before the other fields", () => {
    const result = validateTarget({ hardwareAddress: "bad", broadcastAddress: "bad", port: 0 });
    expect(result.ok ? undefined : result.outcome).toBe("InvalidHardwareAddress");
  });

  it("reports the broadcast address before the port", () => {
    const result = validateTarget({ ...valid, broadcastAddress: "192.168.0.1.255", port: 0 });
    expect(result.ok ? undefined : result.outcome).toBe("InvalidBroadcastAddress");
  });

  it("reports the port last", () => {
    const result = validateTarget({ ...valid, port: 65_536 });
    expect(result.ok ? undefined : result.outcome).toBe("InvalidPort");
  });
});
