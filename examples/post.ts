/**
 * Minimal event-loop example.
 *
 *   tsx examples/post.ts https://httpbin.org/post
 *
 * Posts a JSON body, sleeps on the session's wake signal between
 * notifications and prints the response once the request settles.
 */
import { HttpIO, HttpRequest, WakeWaiter, WAIT_HTTP } from "../src/index.js";

async function main(url: string): Promise<void> {
  const io = new HttpIO({ trace: process.env.HTTP_TRACE === "1" });
  const waiter = new WakeWaiter();
  io.addEvents(waiter, WAIT_HTTP);

  const request = new HttpRequest(url, {
    body: JSON.stringify({ hello: "world", sentAt: new Date().toISOString() }),
  });
  io.post(request);

  while (request.status === "inflight") {
    const flags = await waiter.wait(1000);
    if (flags & WAIT_HTTP) {
      console.log(`[example] uploaded ${io.postPosition(request)}/${request.out.length} bytes`);
    }
  }

  console.log(`[example] ${request.status} (HTTP ${request.httpStatus}), reachable=${waiter.reachable}`);
  console.log(request.text());
  io.cancel(request);
  await io.drain();
}

main(process.argv[2] ?? "https://httpbin.org/post").catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
