import { describe, it, expect } from "vitest";
import { ResponseBuffer } from "../../src/response-buffer.js";

const encode = (s: string) => new TextEncoder().encode(s);

describe("ResponseBuffer", () => {
  describe("growable", () => {
    it("should append committed bytes", () => {
      const buf = new ResponseBuffer();
      buf.reserve(5).set(encode("hello"));
      buf.commit(5);
      buf.reserve(6).set(encode(" world"));
      buf.commit(6);
      expect(buf.size).toBe(11);
      expect(buf.toString()).toBe("hello world");
    });

    it("should only commit what was actually written", () => {
      const buf = new ResponseBuffer();
      const region = buf.reserve(10);
      region.set(encode("abc"));
      buf.commit(3);
      expect(buf.toString()).toBe("abc");
    });

    it("should clamp commits to the reservation", () => {
      const buf = new ResponseBuffer();
      buf.reserve(2).set(encode("ab"));
      buf.commit(50);
      expect(buf.size).toBe(2);
      buf.commit(1); // no open reservation
      expect(buf.size).toBe(2);
    });

    it("should keep earlier data when growing", () => {
      const buf = new ResponseBuffer();
      buf.reserve(3).set(encode("abc"));
      buf.commit(3);
      const big = new Uint8Array(10_000).fill(0x78);
      buf.reserve(big.length).set(big);
      buf.commit(big.length);
      expect(buf.size).toBe(10_003);
      expect(new TextDecoder().decode(buf.bytes().subarray(0, 4))).toBe("abcx");
    });

    it("should reject negative reservations", () => {
      expect(() => new ResponseBuffer().reserve(-1)).toThrow(RangeError);
    });
  });

  describe("pre-sized", () => {
    it("should clip reservations to the remaining capacity", () => {
      const buf = new ResponseBuffer(new Uint8Array(4));
      expect(buf.isPresized).toBe(true);
      const region = buf.reserve(10);
      expect(region.length).toBe(4);
      region.set(encode("data"));
      buf.commit(10);
      expect(buf.size).toBe(4);
      expect(buf.reserve(1).length).toBe(0);
    });

    it("should write into the caller's destination", () => {
      const destination = new Uint8Array(3);
      const buf = new ResponseBuffer(destination);
      buf.reserve(3).set(encode("xyz"));
      buf.commit(3);
      expect(new TextDecoder().decode(destination)).toBe("xyz");
    });

    it("should refuse a lease larger than the destination", () => {
      const buf = new ResponseBuffer(new Uint8Array(2));
      expect(() => buf.lease(3)).toThrow(RangeError);
    });
  });

  describe("lease", () => {
    it("should resize contents to the leased size", () => {
      const buf = new ResponseBuffer();
      buf.reserve(3).set(encode("old"));
      buf.commit(3);
      const lease = buf.lease(5);
      expect(buf.size).toBe(5);
      expect(lease.capacity).toBe(5);
      expect(lease.write(encode("ab"))).toBe(true);
      expect(lease.write(encode("cde"))).toBe(true);
      expect(lease.remaining).toBe(0);
      expect(buf.toString()).toBe("abcde");
    });

    it("should reject writes past the end", () => {
      const lease = new ResponseBuffer().lease(2);
      expect(lease.write(encode("abc"))).toBe(false);
      expect(lease.written).toBe(0);
    });

    it("should revoke the previous lease on a new lease or clear", () => {
      const buf = new ResponseBuffer();
      const first = buf.lease(2);
      const second = buf.lease(2);
      expect(first.revoked).toBe(true);
      expect(first.write(encode("a"))).toBe(false);
      buf.clear();
      expect(second.revoked).toBe(true);
      expect(buf.size).toBe(0);
    });
  });
});
