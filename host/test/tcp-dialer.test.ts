import assert from "node:assert/strict";
import test from "node:test";

import { DialError } from "../src/errors";
import { dialTcp } from "../src/tcp-dialer";
import { readBytes, startTarget, unusedPort, withTimeout } from "./helpers";

test("dialer: connects to a listening target", async () => {
  const target = await startTarget();
  try {
    const socket = await withTimeout(dialTcp({ host: "127.0.0.1", port: target.port }));
    const peer = await withTimeout(target.nextConnection());

    assert.equal(socket.remotePort, target.port);
    socket.write("ping");
    assert.equal((await withTimeout(readBytes(peer, 4))).toString(), "ping");
    socket.destroy();
  } finally {
    await target.close();
  }
});

test("dialer: refused connections reject with DialError", async () => {
  const port = await unusedPort();

  await assert.rejects(dialTcp({ host: "127.0.0.1", port }), (err: unknown) => {
    assert.ok(err instanceof DialError);
    assert.equal(err.code, "dial");
    assert.equal(err.target, `127.0.0.1:${port}`);
    assert.ok(err.message.startsWith(`Error connecting to target 127.0.0.1:${port}: `));
    return true;
  });
});
