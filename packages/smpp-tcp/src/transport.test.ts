// Tests for the TCP dialer and sessions over framed streams.

import net from "node:net";
import { Duplex } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { type Logger, Session, SessionError } from "@smpplink/smpp-core";
import { headerCodec, type Pdu, pdu, responseTo } from "@smpplink/smpp-wire";
import { LengthPrefixedFramed } from "./framing.ts";
import { createTcpSession, tcpDialer } from "./transport.ts";

const quiet: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

// Two streams wired back to back, like the ends of a TCP connection
function socketPair(): [Duplex, Duplex] {
  const end = (peer: () => Duplex) =>
    new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        peer().push(chunk);
        callback();
      },
      destroy(error, callback) {
        const other = peer();
        if (!other.destroyed && !other.readableEnded) other.push(null);
        callback(error);
      },
    });
  const a: Duplex = end(() => b);
  const b: Duplex = end(() => a);
  return [a, b];
}

class Smsc {
  constructor(readonly framed: LengthPrefixedFramed) {}

  async next(): Promise<Pdu> {
    const result = await this.framed.recvTimeout(1000);
    if (result.kind !== "frame") throw new Error(`SMSC expected a frame, got ${result.kind}`);
    return headerCodec.decode(result.frame);
  }

  send(message: Pdu): Promise<void> {
    return this.framed.send(headerCodec.encode(message));
  }
}

function refusingSocket(message: string): net.Socket {
  const socket = new net.Socket();
  setImmediate(() => socket.emit("error", new Error(message)));
  return socket;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("session over a framed stream", () => {
  it("binds, submits and serves pushes", async () => {
    const [clientEnd, serverEnd] = socketPair();
    const smsc = new Smsc(new LengthPrefixedFramed(serverEnd));
    const session = new Session("smsc.test", 2775, {
      dialer: async () => new LengthPrefixedFramed(clientEnd),
      logger: quiet,
      pollInterval: 5,
    });

    await session.connect();
    const bind = session.bind("transceiver", new Uint8Array([0x61, 0x00]));
    const bindRequest = await smsc.next();
    expect(bindRequest).toMatchObject({ command: "bind_transceiver", sequence: 1 });
    expect(bindRequest.body).toEqual(new Uint8Array([0x61, 0x00]));
    await smsc.send(responseTo({ command: "bind_transceiver", sequence: 1 }));
    await bind;
    expect(session.state).toBe("bound_trx");

    const submit = session.sendMessage(new Uint8Array([0x02]));
    const submitRequest = await smsc.next();
    await smsc.send(responseTo({ command: "submit_sm", sequence: submitRequest.sequence }, 0, new Uint8Array([0x31, 0x00])));
    expect((await submit).body).toEqual(new Uint8Array([0x31, 0x00]));

    const pushed: number[] = [];
    session.setPushHandler((message) => {
      pushed.push(message.sequence);
    });
    const listening = session.listen();
    await smsc.send(pdu("deliver_sm", 40));
    expect(await smsc.next()).toMatchObject({ command: "deliver_sm_resp", sequence: 40 });
    await smsc.send(pdu("unbind", 41));

    expect(await listening).toMatchObject({ reason: "unbind" });
    expect(pushed).toEqual([40]);
    await session.disconnect();
    expect(session.state).toBe("closed");
  });

  it("closes the session when the peer hangs up", async () => {
    const [clientEnd, serverEnd] = socketPair();
    const smscSide = new LengthPrefixedFramed(serverEnd);
    const session = new Session("smsc.test", 2775, {
      dialer: async () => new LengthPrefixedFramed(clientEnd),
      logger: quiet,
      pollInterval: 5,
    });
    await session.connect();

    const receiving = session.receive(1000);
    smscSide.close();

    expect(await receiving).toBeNull();
    expect(session.state).toBe("closed");
  });

  it("tears the session down on a framing fault", async () => {
    const [clientEnd, serverEnd] = socketPair();
    const session = new Session("smsc.test", 2775, {
      dialer: async () => new LengthPrefixedFramed(clientEnd),
      logger: quiet,
      pollInterval: 5,
    });
    await session.connect();

    const receiving = session.receive(1000);
    serverEnd.write(Buffer.from([0x00, 0x00, 0x00, 0x01]));

    await expect(receiving).rejects.toMatchObject({
      kind: "framing",
      message: "Invalid length prefix 1: smaller than the prefix itself",
    });
    expect(session.state).toBe("closed");
  });
});

describe("tcpDialer", () => {
  it("reports a refused connection", async () => {
    const connect = vi
      .spyOn(net, "createConnection")
      .mockImplementation(() => refusingSocket("connect ECONNREFUSED 127.0.0.1:2775"));

    const dial = tcpDialer()("127.0.0.1", 2775);
    await expect(dial).rejects.toBeInstanceOf(SessionError);
    await expect(dial).rejects.toMatchObject({
      kind: "connection_refused",
      message: "Connection to 127.0.0.1:2775 refused: connect ECONNREFUSED 127.0.0.1:2775",
    });
    expect(connect).toHaveBeenCalledWith({ host: "127.0.0.1", port: 2775 });
  });

  it("gives up after the connect timeout", async () => {
    vi.spyOn(net, "createConnection").mockImplementation(() => new net.Socket());

    await expect(tcpDialer({ connectTimeout: 20 })("10.0.0.1", 2775)).rejects.toMatchObject({
      kind: "connection_refused",
      message: "Connection to 10.0.0.1:2775 refused: no answer within 20ms",
    });
  });

  it("frames the socket once connected", async () => {
    const socket = new net.Socket();
    const noDelay = vi.spyOn(socket, "setNoDelay");
    vi.spyOn(net, "createConnection").mockImplementation(() => {
      setImmediate(() => socket.emit("connect"));
      return socket;
    });

    const transport = await tcpDialer({ noDelay: false })("127.0.0.1", 2775);
    expect(transport).toBeInstanceOf(LengthPrefixedFramed);
    expect(noDelay).toHaveBeenCalledWith(false);
    transport.close();
  });
});

describe("createTcpSession", () => {
  it("connects through the TCP dialer", async () => {
    const connect = vi
      .spyOn(net, "createConnection")
      .mockImplementation(() => refusingSocket("connect ECONNREFUSED 127.0.0.1:2775"));
    const session = createTcpSession("127.0.0.1", 2775, { logger: quiet, connectTimeout: 1000 });

    await expect(session.connect()).rejects.toMatchObject({ kind: "connection_refused" });
    expect(connect).toHaveBeenCalledWith({ host: "127.0.0.1", port: 2775 });
    expect(session.state).toBe("closed");
  });
});
