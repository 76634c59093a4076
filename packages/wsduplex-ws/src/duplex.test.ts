// Tests for WsDuplex over a hand-driven transport.

import { describe, it, expect, vi } from "vitest";
import { State, WebSocketError, messageBytes, messageText } from "@wsduplex/core";
import { WsDuplex } from "./duplex.ts";
import { MockTransport } from "./testing/mock_transport.ts";
import type { StreamItem } from "./shared.ts";

const TEST_URL = "ws://localhost:9000/chat";

function openMock(): { duplex: WsDuplex; transport: MockTransport } {
  const transport = new MockTransport();
  const duplex = WsDuplex.open(TEST_URL, { createTransport: () => transport });
  return { duplex, transport };
}

/** Let pending promise continuations run. */
function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a throw");
}

function errorOf(item: StreamItem | null): WebSocketError {
  if (item === null || item.ok) {
    throw new Error(`expected an error item, got ${JSON.stringify(item)}`);
  }
  return item.error;
}

describe("WsDuplex", () => {
  describe("open", () => {
    it("passes the URL and protocols to the transport factory", () => {
      const factory = vi.fn((_url: string, _protocols?: string | string[]) => new MockTransport());

      WsDuplex.open(TEST_URL, { createTransport: factory });
      WsDuplex.openWithProtocol(TEST_URL, "chat", { createTransport: factory });
      WsDuplex.openWithProtocols(TEST_URL, ["chat", "json"], { createTransport: factory });

      expect(factory.mock.calls).toEqual([
        [TEST_URL, undefined],
        [TEST_URL, "chat"],
        [TEST_URL, ["chat", "json"]],
      ]);
    });

    it("wraps a factory failure in a construction error", () => {
      const cause = new SyntaxError("Invalid URL: nope");
      const error = thrownBy(() =>
        WsDuplex.open("nope", {
          createTransport: () => {
            throw cause;
          },
        }),
      );

      expect(error).toBeInstanceOf(WebSocketError);
      expect(error).toMatchObject({ kind: "construction", cause });
    });
  });

  describe("sink", () => {
    it("stays pending while connecting and resolves on open", async () => {
      const { duplex, transport } = openMock();
      let resolved = false;
      const ready = duplex.ready().then(() => {
        resolved = true;
      });

      await settle();
      expect(resolved).toBe(false);

      transport.simulateOpen();
      await ready;
      expect(resolved).toBe(true);
    });

    it("is ready at once when open, closing or closed", async () => {
      const { duplex, transport } = openMock();
      for (const readyState of [1, 2, 3]) {
        transport.readyState = readyState;
        await expect(duplex.ready()).resolves.toBeUndefined();
      }
    });

    it("wakes every sender waiting for open", async () => {
      const { duplex, transport } = openMock();
      const [sink] = duplex.split();

      const first = sink.send(messageText("first"));
      const second = sink.send(messageText("second"));
      await settle();
      expect(transport.sent).toEqual([]);

      transport.simulateOpen();
      await Promise.all([first, second]);
      expect(transport.sent).toEqual(["first", "second"]);
    });

    it("sends text and bytes to the transport", async () => {
      const { duplex, transport } = openMock();
      transport.simulateOpen();

      await duplex.send(messageText("hi"));
      duplex.startSend(messageBytes(new Uint8Array([1, 2, 3])));

      expect(transport.sent).toEqual(["hi", new Uint8Array([1, 2, 3])]);
    });

    it("wraps a transport send failure", () => {
      const { duplex, transport } = openMock();
      transport.readyState = 2;

      const error = thrownBy(() => duplex.startSend(messageText("late")));
      expect(error).toBeInstanceOf(WebSocketError);
      expect(error).toMatchObject({ kind: "send", message: "failed to send message: WebSocket not open" });
    });

    it("lets a waiting send fail when the connection closes before opening", async () => {
      const { duplex, transport } = openMock();
      const sending = duplex.send(messageText("never"));

      transport.simulateError();
      transport.simulateClose(1006, "", false);

      await expect(sending).rejects.toMatchObject({ kind: "send" });
      expect(transport.sent).toEqual([]);
    });

    it("flushes and ends without touching the connection", async () => {
      const { duplex, transport } = openMock();
      transport.simulateOpen();

      await duplex.flush();
      await duplex.end();
      expect(duplex.state()).toBe(State.Open);
      expect(transport.closeCalls).toEqual([]);
    });
  });

  describe("stream", () => {
    it("yields messages, errors and the close event in order, then ends", async () => {
      const { duplex, transport } = openMock();
      transport.simulateOpen();
      transport.simulateMessage("a");
      transport.simulateError();
      transport.simulateMessage(new Uint8Array([7]).buffer);
      transport.simulateClose(1000, "bye", true);

      expect(await duplex.next()).toEqual({ ok: true, value: { tag: "Text", value: "a" } });
      expect(errorOf(await duplex.next()).kind).toBe("connection");
      expect(await duplex.next()).toEqual({
        ok: true,
        value: { tag: "Bytes", value: new Uint8Array([7]) },
      });

      const closed = errorOf(await duplex.next());
      expect(closed.kind).toBe("closed");
      expect(closed.closeEvent).toEqual({ code: 1000, reason: "bye", wasClean: true });

      expect(await duplex.next()).toBeNull();
      expect(await duplex.next()).toBeNull();
    });

    it("waits for a notification", async () => {
      const { duplex, transport } = openMock();
      const next = duplex.next();

      transport.simulateOpen();
      transport.simulateMessage("late");
      expect(await next).toEqual({ ok: true, value: { tag: "Text", value: "late" } });
    });

    it("yields the close error before ending when closed while waiting", async () => {
      const { duplex, transport } = openMock();
      const next = duplex.next();

      transport.simulateClose(4000, "gone", false);

      const closed = errorOf(await next);
      expect(closed.closeEvent).toEqual({ code: 4000, reason: "gone", wasClean: false });
      expect(await duplex.next()).toBeNull();
    });

    it("yields a payload error for an unexpected payload and continues", async () => {
      const { duplex, transport } = openMock();
      transport.simulateMessage({ size: 4 });
      transport.simulateMessage("ok");

      const error = errorOf(await duplex.next());
      expect(error.kind).toBe("payload");
      expect(error.message).toBe("unexpected message payload: Object");
      expect(await duplex.next()).toEqual({ ok: true, value: { tag: "Text", value: "ok" } });
    });

    it("iterates until the connection closes", async () => {
      const { duplex, transport } = openMock();
      const [, stream] = duplex.split();
      transport.simulateOpen();
      transport.simulateMessage("x");
      transport.simulateMessage("y");
      transport.simulateClose(1001, "going away", true);

      const seen: string[] = [];
      for await (const item of stream) {
        seen.push(item.ok ? `message:${item.value.tag}` : `error:${item.error.kind}`);
      }
      expect(seen).toEqual(["message:Text", "message:Text", "error:closed"]);
    });
  });

  describe("scenario", () => {
    it("sends before open, receives echoes, and ends on a remote close", async () => {
      const { duplex, transport } = openMock();
      const [sink, stream] = duplex.split();

      const sending = (async () => {
        await sink.send(messageText("a"));
        await sink.send(messageText("b"));
      })();
      transport.simulateOpen();
      await sending;
      expect(transport.sent).toEqual(["a", "b"]);

      transport.simulateMessage("a");
      transport.simulateMessage("b");
      expect(await stream.next()).toEqual({ ok: true, value: messageText("a") });
      expect(await stream.next()).toEqual({ ok: true, value: messageText("b") });

      transport.simulateClose(1000, "bye", true);
      const closed = errorOf(await stream.next());
      expect(closed.closeEvent).toEqual({ code: 1000, reason: "bye", wasClean: true });
      expect(await stream.next()).toBeNull();

      sink.release();
      stream.release();
      expect(transport.closeCalls).toEqual([]);
    });
  });

  describe("state accessors", () => {
    it("reads the state live from the transport", () => {
      const { duplex, transport } = openMock();
      expect(duplex.state()).toBe(State.Connecting);
      transport.simulateOpen();
      expect(duplex.state()).toBe(State.Open);
      transport.readyState = 2;
      expect(duplex.state()).toBe(State.Closing);
      transport.simulateClose();
      expect(duplex.state()).toBe(State.Closed);
    });

    it("throws a state error for an unknown readyState", () => {
      const { duplex, transport } = openMock();
      transport.readyState = 9;
      expect(thrownBy(() => duplex.state())).toMatchObject({ kind: "state" });
    });

    it("rejects ready() for an unknown readyState", async () => {
      const { duplex, transport } = openMock();
      transport.readyState = 9;
      await expect(duplex.ready()).rejects.toMatchObject({ kind: "state" });
    });

    it("passes protocol and extensions through", () => {
      const { duplex, transport } = openMock();
      expect(duplex.protocol()).toBe("");
      expect(duplex.extensions()).toBe("");

      transport.simulateOpen("chat", "permessage-deflate");
      expect(duplex.protocol()).toBe("chat");
      expect(duplex.extensions()).toBe("permessage-deflate");
    });
  });

  describe("close", () => {
    it("closes without a code", () => {
      const { duplex, transport } = openMock();
      duplex.close();
      expect(transport.closeCalls).toEqual([{ code: undefined, reason: undefined }]);
    });

    it("closes with a code", () => {
      const { duplex, transport } = openMock();
      duplex.close(1000);
      expect(transport.closeCalls).toEqual([{ code: 1000, reason: undefined }]);
    });

    it("closes with a code and a reason", () => {
      const { duplex, transport } = openMock();
      duplex.close(4000, "done");
      expect(transport.closeCalls).toEqual([{ code: 4000, reason: "done" }]);
    });

    it("uses code 1005 for a reason without a code", () => {
      const { duplex, transport } = openMock();
      const error = thrownBy(() => duplex.close(undefined, "bye"));

      // The transport only accepts 1000 and 3000-4999, so release falls back to a plain close
      expect(error).toMatchObject({ kind: "close", message: "failed to close WebSocket: invalid close code: 1005" });
      expect(transport.closeCalls).toEqual([
        { code: 1005, reason: "bye" },
        { code: undefined, reason: undefined },
      ]);
    });

    it("reports an invalid code and still releases the handle", () => {
      const { duplex, transport } = openMock();
      const error = thrownBy(() => duplex.close(999));

      expect(error).toBeInstanceOf(WebSocketError);
      expect(error).toMatchObject({ kind: "close" });
      expect(duplex.isReleased).toBe(true);
      expect(transport.closeCalls).toHaveLength(2);
    });

    it("reports an oversized reason", () => {
      const { duplex } = openMock();
      const error = thrownBy(() => duplex.close(1000, "x".repeat(124)));
      expect(error).toMatchObject({ kind: "close", message: "failed to close WebSocket: close reason too long" });
    });

    it("consumes the handle", () => {
      const { duplex, transport } = openMock();
      duplex.close(1000);

      expect(thrownBy(() => duplex.state())).toMatchObject({
        kind: "released",
        message: "WsDuplex has been released",
      });
      expect(transport.closeCalls).toHaveLength(1);
    });
  });

  describe("release", () => {
    it("closes the transport once when the last handle goes", () => {
      const { duplex, transport } = openMock();
      transport.simulateOpen();
      const [sink, stream] = duplex.split();

      sink.release();
      expect(transport.closeCalls).toEqual([]);

      stream.release();
      stream.release();
      expect(transport.closeCalls).toEqual([{ code: undefined, reason: undefined }]);
    });

    it("closes when an unsplit handle is released", () => {
      const { duplex, transport } = openMock();
      duplex.release();
      expect(transport.closeCalls).toHaveLength(1);
    });

    it("does not close a connection that is already closed", () => {
      const { duplex, transport } = openMock();
      const [sink, stream] = duplex.split();
      transport.simulateOpen();
      transport.simulateClose();

      stream.release();
      sink.release();
      expect(transport.closeCalls).toEqual([]);
    });

    it("keeps the other half usable", async () => {
      const { duplex, transport } = openMock();
      const [sink, stream] = duplex.split();
      transport.simulateOpen();

      stream.release();
      await sink.send(messageText("still here"));
      expect(transport.sent).toEqual(["still here"]);
    });

    it("consumes the handle on split", () => {
      const { duplex } = openMock();
      duplex.split();
      expect(duplex.isReleased).toBe(true);
      expect(thrownBy(() => duplex.split())).toMatchObject({ kind: "released" });
    });

    it("refuses calls on a released half", async () => {
      const { duplex } = openMock();
      const [sink, stream] = duplex.split();
      sink.release();
      stream.release();

      expect(thrownBy(() => sink.startSend(messageText("x")))).toMatchObject({
        kind: "released",
        message: "WsSink has been released",
      });
      await expect(sink.flush()).rejects.toMatchObject({ kind: "released" });
      expect(thrownBy(() => stream.next())).toMatchObject({
        kind: "released",
        message: "WsStream has been released",
      });
    });

    it("rejects a send still waiting for open when the last handle goes", async () => {
      const { duplex, transport } = openMock();
      const [sink, stream] = duplex.split();
      const sending = sink.send(messageText("x")).then(
        () => null,
        (e: unknown) => e,
      );
      await settle();

      sink.release();
      stream.release();
      transport.simulateClose(1006, "", false);

      expect(await sending).toMatchObject({
        kind: "released",
        message: "connection has been released",
      });
      expect(transport.sent).toEqual([]);
    });

    it("ignores transport events after release", () => {
      const { duplex, transport } = openMock();
      duplex.release();

      expect(() => {
        transport.simulateMessage("late");
        transport.simulateClose();
      }).not.toThrow();
    });
  });
});
