import { describe, it, expect, vi } from "vitest";
import { RequestContext } from "../../src/context.js";
import { GzipInflater } from "../../src/inflate.js";
import { HttpRequest } from "../../src/request.js";

describe("HttpRequest", () => {
  it("should default to an empty JSON request with a growable buffer", () => {
    const request = new HttpRequest("https://example.com/api");
    expect(request.type).toBe("json");
    expect(request.binary).toBe(false);
    expect(request.out.length).toBe(0);
    expect(request.in.isPresized).toBe(false);
    expect(request.status).toBe("ready");
    expect(request.contentLength).toBe(-1);
  });

  it("should encode string bodies as UTF-8", () => {
    const request = new HttpRequest("https://example.com/api", { body: "héllo" });
    expect(Array.from(request.out)).toEqual([104, 195, 169, 108, 108, 111]);
  });

  it("should parse the collected response as JSON", () => {
    const request = new HttpRequest("https://example.com/api");
    const body = new TextEncoder().encode('{"n":[1,2]}');
    request.in.reserve(body.length).set(body);
    request.in.commit(body.length);
    expect(request.json()).toEqual({ n: [1, 2] });
  });

  it("should clear exchange fields on reset", () => {
    const request = new HttpRequest("https://example.com/api");
    request.status = "failure";
    request.httpStatus = 500;
    request.contentLength = 10;
    request.in.lease(10);

    request.reset();

    expect(request.status).toBe("ready");
    expect(request.terminal).toBe(false);
    expect(request.httpStatus).toBe(0);
    expect(request.contentLength).toBe(-1);
    expect(request.in.size).toBe(0);
  });
});

describe("RequestContext", () => {
  it("should hand its request off exactly once", () => {
    const request = new HttpRequest("https://example.com/api");
    const context = new RequestContext(request);

    expect(context.sever()).toBe(request);
    expect(context.sever()).toBeNull();
    expect(context.request).toBeNull();
  });

  it("should release the inflater and notify the owner once on dispose", () => {
    const request = new HttpRequest("https://example.com/api");
    const onDispose = vi.fn();
    const context = new RequestContext(request, onDispose);
    const lease = request.in.lease(4);
    context.inflater = new GzipInflater(lease);

    expect(context.dispose()).toBe(true);
    expect(context.dispose()).toBe(false);

    expect(onDispose).toHaveBeenCalledTimes(1);
    expect(onDispose).toHaveBeenCalledWith(context);
    expect(context.inflater).toBeNull();
    expect(lease.revoked).toBe(true);
    expect(context.request).toBeNull();
  });
});
