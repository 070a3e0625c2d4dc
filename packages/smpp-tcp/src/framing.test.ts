// Tests for length-prefixed framing over a byte stream.

import { Duplex } from "node:stream";
import { describe, expect, it } from "vitest";
import { type RecvResult, SessionError } from "@smpplink/smpp-core";
import { LengthPrefixedFramed } from "./framing.ts";

// Stream whose incoming bytes are pushed by the test
function fakeSocket() {
  const written: Buffer[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback();
    },
  });
  return { stream, written };
}

function frame(...body: number[]): Uint8Array {
  const out = new Uint8Array(4 + body.length);
  new DataView(out.buffer).setUint32(0, out.length);
  out.set(body, 4);
  return out;
}

async function failure(promise: Promise<RecvResult>): Promise<SessionError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof SessionError) return e;
    throw e;
  }
  throw new Error("expected the read to fail");
}

describe("LengthPrefixedFramed", () => {
  it("assembles frames split across chunks", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);

    const first = frame(1, 2, 3);
    const second = frame(9);
    stream.push(Buffer.from(first.subarray(0, 3)));
    stream.push(Buffer.concat([first.subarray(3), second]));

    expect(await framed.recvTimeout(1000)).toEqual({ kind: "frame", frame: first });
    expect(await framed.recvTimeout(1000)).toEqual({ kind: "frame", frame: second });
  });

  it("times out when no complete frame arrives", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    stream.push(Buffer.from([0x00, 0x00, 0x00, 0x08, 0x01]));

    expect(await framed.recvTimeout(20)).toEqual({ kind: "timeout" });
  });

  it("reports a clean end of stream as eof", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    stream.push(null);

    expect(await framed.recvTimeout(1000)).toEqual({ kind: "eof" });
    expect(await framed.recvTimeout(1000)).toEqual({ kind: "eof" });
  });

  it("rejects a length prefix smaller than itself, on every later read", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    stream.push(Buffer.from([0x00, 0x00, 0x00, 0x02]));

    const error = await failure(framed.recvTimeout(1000));
    expect(error.kind).toBe("framing");
    expect(error.message).toBe("Invalid length prefix 2: smaller than the prefix itself");
    expect(await failure(framed.recvTimeout(1000))).toBe(error);
  });

  it("rejects frames over the size limit", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream, { maxFrameSize: 32 });
    stream.push(Buffer.from([0x00, 0x00, 0x00, 0x40]));

    const error = await failure(framed.recvTimeout(1000));
    expect(error.message).toBe("Frame of 64 bytes exceeds the 32 byte limit");
  });

  it("hands out frames that arrived before a fault", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const good = frame(0x61);
    stream.push(Buffer.concat([good, Buffer.from([0x00, 0x00, 0x00, 0x00])]));

    expect(await framed.recvTimeout(1000)).toEqual({ kind: "frame", frame: good });
    expect((await failure(framed.recvTimeout(1000))).kind).toBe("framing");
  });

  it("fails when the stream ends mid-frame", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    stream.push(Buffer.from([0x00, 0x00, 0x00, 0x14, 0x01, 0x02]));
    stream.push(null);

    const error = await failure(framed.recvTimeout(1000));
    expect(error.kind).toBe("framing");
    expect(error.message).toBe("Connection closed mid-frame (6 of 20 bytes)");
  });

  it("fails when the stream ends inside a length prefix", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    stream.push(Buffer.from([0x00, 0x00]));
    stream.push(null);

    const error = await failure(framed.recvTimeout(1000));
    expect(error.message).toBe("Connection closed inside a length prefix (2 of 4 bytes)");
  });

  it("reports stream errors as io errors", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const read = framed.recvTimeout(1000);
    stream.destroy(new Error("read ECONNRESET"));

    const error = await failure(read);
    expect(error.kind).toBe("io");
    expect(error.message).toBe("read ECONNRESET");
  });

  it("refuses concurrent reads", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const first = framed.recvTimeout(50);

    const error = await failure(framed.recvTimeout(50));
    expect(error.kind).toBe("usage");
    expect(await first).toEqual({ kind: "timeout" });
  });

  it("writes each frame in one write", async () => {
    const { stream, written } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const out = frame(0xde, 0xad, 0xbe, 0xef);

    await framed.send(out);
    expect(written).toHaveLength(1);
    expect(new Uint8Array(written[0])).toEqual(out);
  });

  it("refuses to send a frame whose prefix does not match its size", async () => {
    const { stream, written } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const out = frame(1, 2, 3, 4);
    out[3] = 0x14;

    await expect(framed.send(out)).rejects.toThrow("Length prefix 20 does not match frame size 8");
    expect(written).toHaveLength(0);
  });

  it("wakes a pending read with eof on close", async () => {
    const { stream } = fakeSocket();
    const framed = new LengthPrefixedFramed(stream);
    const read = framed.recvTimeout(1000);

    framed.close();
    expect(await read).toEqual({ kind: "eof" });
    expect(stream.destroyed).toBe(true);
    await expect(framed.send(frame())).rejects.toMatchObject({ kind: "closed" });
  });
});
