import { describe, it, expect } from "vitest";
import { createMotionCore } from "../src/core";
import { silentLogger } from "../src/utils/logger";
import { FakeDevice, factoryFor, testEnv } from "./helpers/fakeDevice";

function setup(device: FakeDevice, overrides: Record<string, string> = {}) {
  return createMotionCore(testEnv(overrides), silentLogger, factoryFor(device));
}

describe("ActuatorLink", () => {
  it("becomes ready after the READY handshake", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);

    expect(link.getState()).toBe("disconnected");
    const result = await link.connect();

    expect(result).toEqual({ ok: true, handshake: "ready" });
    expect(link.getState()).toBe("ready");
  });

  it("treats a silent device as ready once the handshake window passes", async () => {
    const device = new FakeDevice({ greet: false });
    const { link } = setup(device);

    const result = await link.connect();

    expect(result).toEqual({ ok: true, handshake: "timeout" });
    expect(link.isReady()).toBe(true);
  });

  it("writes channel:angle and succeeds on an OK acknowledgment", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    const result = await link.send("left_arm", 170);

    expect(result).toEqual({ ok: true, channel: 4, angle: 170 });
    expect(device.written).toEqual(["4:170\n"]);
    expect(link.positionOf("left_arm")).toBe(170);
  });

  it("resolves the head alias to the pan channel", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    await link.send("head", 100);

    expect(device.written).toEqual(["2:100\n"]);
    expect(link.positionOf("pan")).toBe(100);
  });

  it("honours channel overrides from configuration", async () => {
    const device = new FakeDevice();
    const { link } = setup(device, { SERVO_CHANNELS: "left_arm:9" });
    await link.connect();

    await link.send("left_arm", 45);

    expect(device.written).toEqual(["9:45\n"]);
  });

  it("rejects unknown actuators without touching the wire", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    const result = await link.send("tail", 90);

    expect(result).toEqual({ ok: false, error: "unknown_actuator" });
    expect(device.written).toEqual([]);
  });

  it("rejects out-of-range and fractional angles", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    const high = await link.send("pan", 181);
    const fractional = await link.send("pan", 45.5);
    const negative = await link.send("pan", -1);

    expect(high.ok).toBe(false);
    expect(fractional.ok).toBe(false);
    expect(negative.ok).toBe(false);
    if (!high.ok) expect(high.error).toBe("out_of_range");
    expect(device.written).toEqual([]);
  });

  it("returns not_connected and sends nothing when never connected", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);

    const result = await link.send("pan", 90);

    expect(result).toEqual({ ok: false, error: "not_connected" });
    expect(device.written).toEqual([]);
  });

  it("reports link_unavailable for a port that cannot be opened", async () => {
    const device = new FakeDevice({ path: "/dev/missing", failOpen: true });
    const { link } = setup(device);

    const connected = await link.connect();
    const sent = await link.send("pan", 90);

    expect(connected.ok).toBe(false);
    if (!connected.ok) {
      expect(connected.error).toBe("link_unavailable");
      expect(connected.message).toContain("/dev/missing");
    }
    expect(sent).toEqual({ ok: false, error: "not_connected" });
    expect(link.getState()).toBe("disconnected");
  });

  it("reports a nack when the device answers with anything but OK", async () => {
    const device = new FakeDevice({ reply: () => "ERR bad channel" });
    const { link } = setup(device);
    await link.connect();

    const result = await link.send("pan", 120);

    expect(result).toEqual({ ok: false, error: "nack", message: "ERR bad channel" });
    expect(link.positionOf("pan")).toBe(90);
  });

  it("reports ack_timeout when the device stays silent", async () => {
    const device = new FakeDevice({ reply: () => null });
    const { link } = setup(device);
    await link.connect();

    const result = await link.send("pan", 120);

    expect(result).toEqual({ ok: false, error: "ack_timeout" });
    expect(device.written).toEqual(["2:120\n"]);
  });

  it("does not hand a late reply to the next command", async () => {
    const device = new FakeDevice({
      reply: (command) => (command === "2:120" ? "ERR" : "OK"),
      replyDelayMs: (command) => (command === "2:120" ? 75 : 0),
    });
    const { link } = setup(device);
    await link.connect();

    const first = await link.send("pan", 120);
    const second = await link.send("pan", 100);

    expect(first).toEqual({ ok: false, error: "ack_timeout" });
    expect(second).toEqual({ ok: true, channel: 2, angle: 100 });
    expect(link.positionOf("pan")).toBe(100);
  });

  it("records the angle when a late reply is OK", async () => {
    const device = new FakeDevice({ replyDelayMs: 75 });
    const { link } = setup(device);
    await link.connect();

    expect(await link.send("pan", 120)).toEqual({ ok: false, error: "ack_timeout" });
    expect(link.positionOf("pan")).toBe(120);
  });

  it("shares one attempt between overlapping connects", async () => {
    const device = new FakeDevice();
    let created = 0;
    const { link } = createMotionCore(testEnv(), silentLogger, () => {
      created++;
      return device;
    });

    const [first, second] = await Promise.all([link.connect(), link.connect()]);

    expect(created).toBe(1);
    expect(first).toEqual({ ok: true, handshake: "ready" });
    expect(second).toEqual({ ok: true, handshake: "ready" });
  });

  it("drops to disconnected after a write failure", async () => {
    const device = new FakeDevice({ failWrite: true });
    const { link } = setup(device);
    await link.connect();

    const first = await link.send("pan", 100);
    const second = await link.send("pan", 100);

    expect(first.ok).toBe(false);
    if (!first.ok) expect(first.error).toBe("write_failed");
    expect(second).toEqual({ ok: false, error: "not_connected" });
    expect(link.getState()).toBe("disconnected");
  });

  it("drops to disconnected when the device goes away", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    device.unplug();

    expect(link.getState()).toBe("disconnected");
    expect(await link.send("pan", 90)).toEqual({ ok: false, error: "not_connected" });
  });

  it("closes idempotently", async () => {
    const device = new FakeDevice();
    const { link } = setup(device);
    await link.connect();

    await link.close();
    await link.close();

    expect(device.opened).toBe(false);
    expect(link.getState()).toBe("disconnected");
  });
});
